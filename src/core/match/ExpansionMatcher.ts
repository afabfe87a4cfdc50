export type ExpansionScan = {
	/** Length of the common prefix */
	prefix: number;
	/** Where the common suffix starts in the old name */
	suffixStartOld: number;
	/** Where the common suffix starts in the new name */
	suffixStartNew: number;
};

/**
 * Squeeze two names from both ends: a forward cursor over the common prefix, then a
 * backward cursor pair over the common suffix that never crosses the forward one.
 * Positions count Unicode scalar values, not UTF-16 code units.
 */
export function scanExpansion(old: string, next: string): ExpansionScan {
	const a = Array.from(old);
	const b = Array.from(next);

	let i = 0;
	while (i < a.length && i < b.length && a[i] === b[i]) i++;

	let jOld = a.length;
	let jNew = b.length;
	while (jOld > i && jNew > i && a[jOld - 1] === b[jNew - 1]) {
		jOld--;
		jNew--;
	}

	return { prefix: i, suffixStartOld: jOld, suffixStartNew: jNew };
}

/**
 * Match if `next` is `old` with characters inserted somewhere after its first character.
 *
 * Examples:
 * route_report.csv -> route_report_before.csv   match
 * README           -> README.md                 match
 * config.yml       -> config.yaml               match
 * data.json        -> metadata.json             no match (insertion at the start)
 * route_report.csv -> route-report_before.csv   no match (old is not fully consumed)
 */
export function isExpansion(old: string, next: string): boolean {
	if (Array.from(next).length <= Array.from(old).length) return false;
	const scan = scanExpansion(old, next);
	// every character of old sits in the prefix or the suffix, and the prefix is not empty
	return scan.prefix === scan.suffixStartOld && scan.prefix > 0;
}
