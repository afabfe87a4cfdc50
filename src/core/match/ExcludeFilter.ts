import picomatch from 'picomatch';

export class ExcludeFilter {
	private readonly matchers: ((s: string) => boolean)[];

	constructor(excludes: string[] = []) {
		this.matchers = excludes
			.filter((g) => g.trim().length > 0)
			.map((g) => picomatch(g, { dot: true, nocase: false }));
	}

	excludes(basename: string): boolean {
		return this.matchers.some((m) => m(basename));
	}
}
