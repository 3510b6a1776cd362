import type { EnvEntry } from './EnvEntry';
import { parseEnvLine } from './parseEnvLine';

/**
 * Parse a whole env document. Comment lines directly above a variable become
 * its `precedingComments`; a comment run ended by a blank line or the end of
 * input is emitted as orphan comments at that point.
 *
 * @throws InvalidLineError on the first line that is neither blank, a comment
 * nor an assignment.
 */
export function parseEnvContent(content: string): EnvEntry[] {
	const lines = content.split(/\r?\n/);
	// a trailing terminator ends the last line, it does not open a new one
	if (lines[lines.length - 1] === '') {
		lines.pop();
	}

	const entries: EnvEntry[] = [];
	let pendingComments: string[] = [];

	const flushPending = () => {
		for (const text of pendingComments) {
			entries.push({ type: 'comment', text });
		}
		pendingComments = [];
	};

	for (const line of lines) {
		const entry = parseEnvLine(line);
		switch (entry.type) {
			case 'comment':
				pendingComments.push(entry.text);
				break;
			case 'blank':
				flushPending();
				entries.push(entry);
				break;
			case 'variable':
				entries.push({ ...entry, precedingComments: pendingComments });
				pendingComments = [];
				break;
		}
	}

	flushPending();
	return entries;
}
