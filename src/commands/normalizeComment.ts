import { COMMENT_MARKER } from './constants';

/**
 * Strip the `#` marker and a single following space from a trimmed comment,
 * e.g. `# note` => `note`, `#  indented` => ` indented`, `## Title` => `# Title`.
 */
export function normalizeComment(raw: string): string {
	const trimmed = raw.trim();
	const body = trimmed.startsWith(COMMENT_MARKER)
		? trimmed.slice(COMMENT_MARKER.length)
		: trimmed;
	return body.startsWith(' ') ? body.slice(1) : body;
}
