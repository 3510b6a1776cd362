import type { EnvEntry, EnvVariable } from './EnvEntry';

/** First variable entry with the given key; later duplicates are ignored. */
export function findEnvVariable(
	entries: EnvEntry[],
	key: string
): EnvVariable | undefined {
	for (const entry of entries) {
		if (entry.type === 'variable' && entry.key === key) {
			return entry;
		}
	}
	return undefined;
}
