export { BebopCompiler, expandArgs, renderIndex } from "./bebop-compiler";
export type { BebopCompilerOptions } from "./bebop-compiler";
