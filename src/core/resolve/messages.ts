export function renamedMessage(from: string, to: string): string {
	return `${from} → ${to}`;
}

export function previewMessage(from: string, to: string): string {
	return `${from} → ${to} (dry run)`;
}

export function targetExistsMessage(name: string): string {
	return `Target '${name}' already exists. Use --force to overwrite.`;
}

export function noMatchMessage(name: string): string {
	return `No matching files found for '${name}'`;
}

export function ambiguousMessage(name: string, candidates: readonly string[]): string {
	const lines = [`Multiple candidates found for '${name}':`];
	for (const c of candidates) lines.push(`  ${c}`);
	lines.push('', 'Cannot proceed - ambiguous match.');
	return lines.join('\n');
}

export function invalidPathMessage(target: string): string {
	return `Invalid target name '${target}'`;
}

export function unreadableMessage(detail: string): string {
	return `Failed to read directory: ${detail}`;
}

export function renameFailedMessage(detail: string): string {
	return `Failed to rename: ${detail}`;
}
