import path from 'node:path';
import type { DirEntry, IDirectoryFs, ILogger } from '../../types/index.js';
import type { MatchVerdict, ResolveOptions, ResolveResult } from '../../types/resolve.js';
import { FsSafe, errorMessage } from '../fs/FsSafe.js';
import { Logger } from '../log/Logger.js';
import { ExcludeFilter } from '../match/ExcludeFilter.js';
import { matchIntent } from '../match/IntentMatcher.js';
import { ResolveError } from './ResolveError.js';
import {
	ambiguousMessage,
	invalidPathMessage,
	noMatchMessage,
	renameFailedMessage,
	renamedMessage,
	targetExistsMessage,
	unreadableMessage,
} from './messages.js';

type ResolvedTarget = {
	directory: string;
	name: string;
	targetPath: string;
};

type Candidate = {
	name: string;
	verdict: MatchVerdict;
};

/**
 * Turns a single target name into at most one rename inside the target's directory.
 *
 * The working directory is passed in with each call, so the resolver holds no state
 * between resolutions and can run against any directory fixture.
 */
export class CandidateResolver {
	private fs: IDirectoryFs;
	private logger: ILogger;

	constructor(deps: { fs?: IDirectoryFs; logger?: ILogger } = {}) {
		this.fs = deps.fs ?? new FsSafe();
		this.logger = deps.logger ?? new Logger();
	}

	async resolve(target: string, options: ResolveOptions): Promise<ResolveResult> {
		try {
			return await this.run(target, options);
		} catch (err) {
			if (!(err instanceof ResolveError)) throw err;
			this.logger.warn('refused', { target, reason: err.reason, candidates: err.candidates });
			return { kind: 'refused', reason: err.reason, message: err.message, candidates: err.candidates };
		}
	}

	private async run(target: string, options: ResolveOptions): Promise<ResolveResult> {
		const resolved = await this.resolvePath(target, options.cwd);
		await this.checkCollision(resolved, options.force ?? false);
		const candidates = await this.scan(resolved, new ExcludeFilter(options.exclude ?? []));

		const [only, ...rest] = candidates;
		if (!only) {
			throw new ResolveError('no-match', noMatchMessage(resolved.name));
		}
		if (rest.length > 0) {
			const names = candidates.map((c) => c.name);
			throw new ResolveError('ambiguous', ambiguousMessage(resolved.name, names), names);
		}

		const from = path.join(resolved.directory, only.name);

		if (options.dryRun) {
			this.logger.info('preview', { from, to: resolved.targetPath, verdict: only.verdict });
			return { kind: 'preview', directory: resolved.directory, from: only.name, to: resolved.name, verdict: only.verdict };
		}

		try {
			await this.fs.rename(from, resolved.targetPath);
		} catch (err) {
			this.logger.error(err instanceof Error ? err : String(err), { from, to: resolved.targetPath });
			throw new ResolveError('rename-failed', renameFailedMessage(errorMessage(err)));
		}
		this.logger.info(renamedMessage(only.name, resolved.name), { from, to: resolved.targetPath, verdict: only.verdict });
		return { kind: 'applied', directory: resolved.directory, from: only.name, to: resolved.name, verdict: only.verdict };
	}

	private async resolvePath(target: string, cwd: string): Promise<ResolvedTarget> {
		const name = path.basename(target);
		const trailingSep = target.endsWith('/') || target.endsWith(path.sep);
		if (!name || name === '.' || name === '..' || trailingSep) {
			throw new ResolveError('invalid-path', invalidPathMessage(target));
		}

		const dirPart = path.resolve(cwd, path.dirname(target));
		let directory: string;
		try {
			directory = await this.fs.canonicalize(dirPart);
		} catch (err) {
			throw new ResolveError('directory-unreadable', unreadableMessage(errorMessage(err)));
		}
		return { directory, name, targetPath: path.join(directory, name) };
	}

	private async checkCollision(resolved: ResolvedTarget, force: boolean): Promise<void> {
		let occupied: boolean;
		try {
			occupied = await this.fs.exists(resolved.targetPath);
		} catch (err) {
			throw new ResolveError('directory-unreadable', unreadableMessage(errorMessage(err)));
		}
		if (occupied && !force) {
			throw new ResolveError('target-exists', targetExistsMessage(resolved.name));
		}
	}

	private async scan(resolved: ResolvedTarget, filter: ExcludeFilter): Promise<Candidate[]> {
		let entries: DirEntry[];
		try {
			entries = await this.fs.list(resolved.directory);
		} catch (err) {
			// the whole scan fails, never a partial listing
			throw new ResolveError('directory-unreadable', unreadableMessage(errorMessage(err)));
		}

		const candidates: Candidate[] = [];
		for (const entry of entries) {
			if (!entry.isFile || entry.name === resolved.name) continue;
			if (filter.excludes(entry.name)) continue;
			const verdict = matchIntent(entry.name, resolved.name);
			if (!verdict) continue;
			this.logger.debug?.('candidate', { name: entry.name, ...verdict });
			candidates.push({ name: entry.name, verdict });
		}
		return candidates.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
	}
}
