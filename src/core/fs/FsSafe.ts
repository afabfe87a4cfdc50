import fs from 'node:fs/promises';
import path from 'node:path';
import type { DirEntry, IDirectoryFs } from '../../types/index.js';

export class FsSafe implements IDirectoryFs {
	async canonicalize(dir: string): Promise<string> {
		return await fs.realpath(dir);
	}

	/**
	 * True if anything occupies `p`, including a dangling symlink.
	 * Only a missing entry counts as absent; other errors propagate.
	 */
	async exists(p: string): Promise<boolean> {
		try {
			await fs.lstat(p);
			return true;
		} catch (err) {
			if (isMissingError(err)) return false;
			throw err;
		}
	}

	/**
	 * Lists a directory. Symlinks are followed so a link to a regular file counts as a file.
	 * A link whose target cannot be stat'ed (dangling, looping, unreadable) is not a file.
	 * Only a failure to read the directory itself rejects.
	 */
	async list(dir: string): Promise<DirEntry[]> {
		const dirents = await fs.readdir(dir, { withFileTypes: true });
		const entries: DirEntry[] = [];
		for (const d of dirents) {
			if (d.isFile()) {
				entries.push({ name: d.name, isFile: true });
				continue;
			}
			if (!d.isSymbolicLink()) {
				entries.push({ name: d.name, isFile: false });
				continue;
			}
			entries.push({ name: d.name, isFile: await isLinkToFile(path.join(dir, d.name)) });
		}
		return entries;
	}

	// Single attempt: a failed same-directory rename will not succeed on retry.
	async rename(from: string, to: string): Promise<void> {
		await fs.rename(from, to);
	}
}

async function isLinkToFile(p: string): Promise<boolean> {
	return fs.stat(p).then(
		(st) => st.isFile(),
		() => false,
	);
}

export function isMissingError(err: unknown): err is NodeJS.ErrnoException {
	return (
		typeof err === 'object' &&
		err !== null &&
		'code' in err &&
		err.code === 'ENOENT'
	);
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
