import type { RefusalReason } from '../../types/resolve.js';

/**
 * A refusal raised by one of the resolution steps. `CandidateResolver.resolve` converts it
 * into a `refused` result; every other error propagates to the caller.
 */
export class ResolveError extends Error {
	readonly reason: RefusalReason;
	readonly candidates: string[];

	constructor(reason: RefusalReason, message: string, candidates: string[] = []) {
		super(message);
		this.name = 'ResolveError';
		this.reason = reason;
		this.candidates = candidates;
	}
}
