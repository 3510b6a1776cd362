import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EnvSyncError } from './EnvSyncError';
import { parseEnvContent } from './parseEnvContent';
import { serializeEnvEntries } from './serializeEnvEntries';
import { writeEnvFile } from './writeEnvFile';

describe('writeEnvFile', () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-sync-write-'));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it('writes the serialized entries', () => {
		const target = path.join(dir, '.env');
		writeEnvFile(
			target,
			serializeEnvEntries(parseEnvContent('# c\nA=1 # x\n\n# tail'))
		);
		expect(fs.readFileSync(target, 'utf-8')).toBe('# c\nA=1 # x\n\n# tail\n');
	});

	it('wraps fs failures as a Write error', () => {
		const target = path.join(dir, 'missing', '.env');
		expect(() => writeEnvFile(target, '')).toThrow(EnvSyncError);
		try {
			writeEnvFile(target, '');
		} catch (error) {
			expect(error).toMatchObject({ kind: 'Write', path: target });
		}
	});
});
