export type EnvSyncErrorKind =
	| 'TemplateNotFound'
	| 'CreateLocal'
	| 'LocalIo'
	| 'TemplateIo'
	| 'LocalParse'
	| 'TemplateParse'
	| 'Write';

const PREFIXES: Record<EnvSyncErrorKind, string> = {
	TemplateNotFound: 'Template file not found',
	CreateLocal: 'Failed to create local file',
	LocalIo: 'Local file IO error',
	TemplateIo: 'Template file IO error',
	LocalParse: 'Local file parse error',
	TemplateParse: 'Template file parse error',
	Write: 'Write error',
};

function describeCause(cause: unknown): string {
	if (cause instanceof Error) return cause.message;
	return String(cause);
}

/**
 * Failure of a sync run, tagged with the step that failed and the file
 * involved. `cause` holds the underlying fs or parse error when there is one.
 */
export class EnvSyncError extends Error {
	readonly kind: EnvSyncErrorKind;
	readonly path: string;

	constructor(kind: EnvSyncErrorKind, path: string, cause?: unknown) {
		const detail = cause === undefined ? path : describeCause(cause);
		super(`${PREFIXES[kind]}: ${detail}`, { cause });
		this.name = 'EnvSyncError';
		this.kind = kind;
		this.path = path;
	}
}
