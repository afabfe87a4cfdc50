export type SplitName = {
	base: string;
	/** From the last dot (inclusive) to the end, or '' when there is none */
	ext: string;
};

/**
 * Split a filename at its last dot. Only a name without any dot is extensionless;
 * `.env` splits as `{ base: '', ext: '.env' }`.
 */
export function splitName(name: string): SplitName {
	const dot = name.lastIndexOf('.');
	if (dot < 0) return { base: name, ext: '' };
	return { base: name.slice(0, dot), ext: name.slice(dot) };
}

/**
 * Match if both names share the same base and only the extension differs, e.g.
 * `data.json` -> `data.yaml` or `file.tar.gz` -> `file.tar.bz2`.
 * Names without an extension never match: `README` -> `README.md` is an expansion instead.
 */
export function isExtensionChange(old: string, next: string): boolean {
	if (old === next) return false;
	const a = splitName(old);
	const b = splitName(next);
	if (!a.ext || !b.ext) return false;
	if (a.base !== b.base) return false;
	return a.ext !== b.ext;
}
