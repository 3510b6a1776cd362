import { describe, expect, it } from 'vitest';

import { parseEnvContent } from './parseEnvContent';
import { serializeEnvEntries, serializeEnvEntry } from './serializeEnvEntries';

describe('serializeEnvEntries', () => {
	it('renders each entry kind', () => {
		expect(serializeEnvEntry({ type: 'blank' })).toBe('\n');
		expect(serializeEnvEntry({ type: 'comment', text: 'orphan' })).toBe(
			'# orphan\n'
		);
		expect(
			serializeEnvEntry({
				type: 'variable',
				key: 'KEY',
				value: 'value',
				precedingComments: ['first', 'second'],
				inlineComment: 'note',
			})
		).toBe('# first\n# second\nKEY=value # note\n');
	});

	it('round-trips a document', () => {
		const input = '# Comment\nKEY=value\n\n# Orphan\nTEST=123 # inline';
		const entries = parseEnvContent(input);
		const output = serializeEnvEntries(entries);

		expect(output).toBe('# Comment\nKEY=value\n\n# Orphan\nTEST=123 # inline\n');
		expect(parseEnvContent(output)).toEqual(entries);
	});

	it('canonicalizes spacing but keeps the parsed structure', () => {
		const input = [
			'#no space',
			'  KEY =  spaced value   #inline',
			'',
			'## Section ##',
			'',
			'EMPTY=',
			'URL=https://example.test/?a=b#frag',
			'# trailing',
		].join('\r\n');
		const entries = parseEnvContent(input);
		const output = serializeEnvEntries(entries);

		expect(output).toBe(
			[
				'# no space',
				'KEY=spaced value # inline',
				'',
				'## Section ##',
				'',
				'EMPTY=',
				'URL=https://example.test/?a=b # frag',
				'# trailing',
				'',
			].join('\n')
		);
		expect(parseEnvContent(output)).toEqual(entries);
	});

	it('renders an empty document as an empty string', () => {
		expect(serializeEnvEntries([])).toBe('');
	});
});
