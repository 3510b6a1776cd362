import { ASSIGNMENT_MARKER, COMMENT_MARKER } from './constants';

/** Characters a key or value cannot hold and still parse back the same. */
const UNREPRESENTABLE = [COMMENT_MARKER, '\n', '\r'];

function isRepresentable(text: string): boolean {
	return !UNREPRESENTABLE.some((ch) => text.includes(ch));
}

/**
 * Parse `KEY=value,OTHER=value` as given to `--set`. Only the first `=` of a
 * pair splits it, and the value may be empty (`KEY=`). Keys and values
 * containing `#` or a line break are rejected.
 */
export function parseKeyValuePairs(input: string): Array<[string, string]> {
	const result: Array<[string, string]> = [];
	if (!input.trim()) return result;

	for (const p of input.split(',')) {
		const eqPos = p.indexOf(ASSIGNMENT_MARKER);
		const key = eqPos === -1 ? '' : p.slice(0, eqPos).trim();
		const value = eqPos === -1 ? '' : p.slice(eqPos + 1).trim();
		if (!key || !isRepresentable(key) || !isRepresentable(value)) {
			throw new Error(`Invalid key-value pair: "${p}". Must be "key=value"`);
		}
		result.push([key, value]);
	}
	return result;
}
