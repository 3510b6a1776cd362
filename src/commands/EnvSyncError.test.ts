import { describe, expect, it } from 'vitest';

import { EnvSyncError } from './EnvSyncError';
import { InvalidLineError } from './InvalidLineError';

describe('EnvSyncError', () => {
	it('names the path when there is no cause', () => {
		const error = new EnvSyncError('TemplateNotFound', '/work/.env.template');
		expect(error.message).toBe('Template file not found: /work/.env.template');
		expect(error.kind).toBe('TemplateNotFound');
		expect(error.path).toBe('/work/.env.template');
		expect(error.name).toBe('EnvSyncError');
	});

	it('carries the underlying error', () => {
		const cause = new InvalidLineError('oops');
		const error = new EnvSyncError('LocalParse', '/work/.env', cause);
		expect(error.message).toBe('Local file parse error: Invalid line: oops');
		expect(error.cause).toBe(cause);
	});

	it('stringifies a non-error cause', () => {
		expect(new EnvSyncError('Write', '/work/.env', 'disk full').message).toBe(
			'Write error: disk full'
		);
	});
});
