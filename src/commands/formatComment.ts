import { COMMENT_MARKER } from './constants';

/** Inverse of normalizeComment: `note` => `# note`, `` => `#`, `# Title` => `## Title`. */
export function formatComment(text: string): string {
	if (text === '' || text.startsWith(COMMENT_MARKER)) {
		return `${COMMENT_MARKER}${text}`;
	}
	return `${COMMENT_MARKER} ${text}`;
}
