// Shared types and interfaces

export interface IConfig {
	/** Glob patterns for entries that are never rename candidates (e.g. "*.lock") */
	exclude: string[];
	/** Report the rename without performing it */
	dryRun: boolean;
	/** Echo log records to stderr */
	verbose: boolean;
}

export interface IConfigStore {
	get(): Promise<IConfig>;
}

export interface ILogger {
	info(msg: string, meta?: Record<string, unknown>): void;
	warn(msg: string, meta?: Record<string, unknown>): void;
	error(msg: string | Error, meta?: Record<string, unknown>): void;
	debug?(msg: string, meta?: Record<string, unknown>): void;
}

export type DirEntry = {
	name: string;
	/** Regular file, or a symlink that resolves to one */
	isFile: boolean;
};

/**
 * Filesystem collaborator used by the resolver. The default implementation is `FsSafe`;
 * tests substitute an in-memory one.
 */
export interface IDirectoryFs {
	canonicalize(dir: string): Promise<string>;
	exists(p: string): Promise<boolean>;
	list(dir: string): Promise<DirEntry[]>;
	rename(from: string, to: string): Promise<void>;
}
