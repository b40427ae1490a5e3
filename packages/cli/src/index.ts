import { buildProgram } from "./program";

const program = buildProgram({
	log: (line) => console.log(line),
	error: (line) => console.error(line),
	exit: (code) => process.exit(code),
	env: process.env,
	platform: process.platform,
});

program.parseAsync(process.argv).catch((err: unknown) => {
	console.error(err);
	process.exit(1);
});
