/**
 * Naming helpers shared by the generators.
 */
import { basename, extname } from "node:path";

/** `schemas/jazz.proto` -> `jazz` */
export function fileStem(path: string): string {
	const name = basename(path);
	return name.slice(0, name.length - extname(name).length);
}

/**
 * Turn a schema stem into a valid identifier for an `export * as` clause.
 * Characters outside `[A-Za-z0-9_$]` become `_`, and a leading digit gets a `_` prefix.
 */
export function moduleIdentifier(stem: string): string {
	const cleaned = stem.replace(/[^A-Za-z0-9_$]/g, "_");
	return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}
