import type { MatchDirection, MatchRelation, MatchVerdict } from '../../types/resolve.js';
import { isExpansion } from './ExpansionMatcher.js';
import { isExtensionChange } from './ExtensionChangeMatcher.js';

export type NamePredicate = (old: string, next: string) => boolean;

type Probe = {
	relation: MatchRelation;
	direction: MatchDirection;
	test: (entry: string, target: string) => boolean;
};

function forward(p: NamePredicate): (entry: string, target: string) => boolean {
	return (entry, target) => p(entry, target);
}

function reverse(p: NamePredicate): (entry: string, target: string) => boolean {
	return (entry, target) => p(target, entry);
}

const RELATIONS: ReadonlyArray<[MatchRelation, NamePredicate]> = [
	['expansion', isExpansion],
	['extension-change', isExtensionChange],
];

const PROBES: readonly Probe[] = RELATIONS.flatMap(([relation, predicate]) => [
	{ relation, direction: 'forward' as const, test: forward(predicate) },
	{ relation, direction: 'reverse' as const, test: reverse(predicate) },
]);

/**
 * Relate a directory entry to the rename target. The user may type either the old or the
 * evolved name, so each predicate is probed in both directions.
 * Returns the first probe that holds, or null when the entry is not a candidate.
 */
export function matchIntent(entry: string, target: string): MatchVerdict | null {
	for (const probe of PROBES) {
		if (probe.test(entry, target)) {
			return { relation: probe.relation, direction: probe.direction };
		}
	}
	return null;
}

export function isCandidate(entry: string, target: string): boolean {
	return matchIntent(entry, target) !== null;
}
