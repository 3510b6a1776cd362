import type { EnvEntry } from './EnvEntry';

export interface SetEnvVariableResult {
	entries: EnvEntry[];
	/** Value the key held before, `undefined` when the key was appended. */
	previous?: string;
}

/**
 * Set the value of the first variable named `key`, keeping its comments.
 * When no such variable exists a bare `key=value` entry is appended.
 */
export function setEnvVariable(
	entries: EnvEntry[],
	key: string,
	value: string
): SetEnvVariableResult {
	const index = entries.findIndex(
		(entry) => entry.type === 'variable' && entry.key === key
	);
	const existing = entries[index];

	if (index === -1 || existing === undefined || existing.type !== 'variable') {
		return {
			entries: [
				...entries,
				{ type: 'variable', key, value, precedingComments: [] },
			],
		};
	}

	const updated = [...entries];
	updated[index] = { ...existing, value };
	return { entries: updated, previous: existing.value };
}
