export type MatchRelation = 'expansion' | 'extension-change';

/** `forward`: the directory entry is the old name and the target the new one. */
export type MatchDirection = 'forward' | 'reverse';

export type MatchVerdict = {
	relation: MatchRelation;
	direction: MatchDirection;
};

export type RefusalReason =
	| 'invalid-path'
	| 'directory-unreadable'
	| 'target-exists'
	| 'no-match'
	| 'ambiguous'
	| 'rename-failed';

export type ResolveOptions = {
	/** Directory that relative targets resolve against */
	cwd: string;
	force?: boolean;
	dryRun?: boolean;
	exclude?: string[];
};

export type ResolveResult =
	| { kind: 'applied'; directory: string; from: string; to: string; verdict: MatchVerdict }
	| { kind: 'preview'; directory: string; from: string; to: string; verdict: MatchVerdict }
	| { kind: 'refused'; reason: RefusalReason; message: string; candidates: string[] };
