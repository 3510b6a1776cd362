import { ASSIGNMENT_MARKER, COMMENT_MARKER } from './constants';
import type { EnvEntry } from './EnvEntry';
import { InvalidLineError } from './InvalidLineError';
import { normalizeComment } from './normalizeComment';

/**
 * Classify a single line on its own. Comments come back as orphan `comment`
 * entries; parseEnvContent decides whether they attach to a variable.
 */
export function parseEnvLine(line: string): EnvEntry {
	const trimmed = line.trim();
	if (!trimmed) {
		return { type: 'blank' };
	}
	if (trimmed.startsWith(COMMENT_MARKER)) {
		return { type: 'comment', text: normalizeComment(trimmed) };
	}

	const eqPos = line.indexOf(ASSIGNMENT_MARKER);
	if (eqPos === -1) {
		throw new InvalidLineError(line);
	}

	const key = line.slice(0, eqPos).trim();
	const valuePart = line.slice(eqPos + ASSIGNMENT_MARKER.length);

	// no escaping: the first `#` always opens the inline comment
	const hashPos = valuePart.indexOf(COMMENT_MARKER);
	if (hashPos === -1) {
		return {
			type: 'variable',
			key,
			value: valuePart.trim(),
			precedingComments: [],
		};
	}
	return {
		type: 'variable',
		key,
		value: valuePart.slice(0, hashPos).trim(),
		precedingComments: [],
		inlineComment: normalizeComment(valuePart.slice(hashPos)),
	};
}
