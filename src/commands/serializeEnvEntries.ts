import { ASSIGNMENT_MARKER } from './constants';
import type { EnvEntry } from './EnvEntry';
import { formatComment } from './formatComment';

export function serializeEnvEntry(entry: EnvEntry): string {
	switch (entry.type) {
		case 'blank':
			return '\n';
		case 'comment':
			return `${formatComment(entry.text)}\n`;
		case 'variable': {
			let output = '';
			for (const comment of entry.precedingComments) {
				output += `${formatComment(comment)}\n`;
			}
			output += `${entry.key}${ASSIGNMENT_MARKER}${entry.value}`;
			if (entry.inlineComment !== undefined) {
				output += ` ${formatComment(entry.inlineComment)}`;
			}
			return `${output}\n`;
		}
	}
}

/** Render entries back to text; every entry ends with `\n`. */
export function serializeEnvEntries(entries: EnvEntry[]): string {
	return entries.map(serializeEnvEntry).join('');
}
