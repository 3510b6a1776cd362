import { describe, expect, it } from 'vitest';

import { parseKeyValuePairs } from './parseKeyValuePairs';

describe('parseKeyValuePairs', () => {
	it('parses comma separated pairs in order', () => {
		expect(parseKeyValuePairs('A=1, B = x=y ,C=')).toEqual([
			['A', '1'],
			['B', 'x=y'],
			['C', ''],
		]);
	});

	it('returns nothing for blank input', () => {
		expect(parseKeyValuePairs('  ')).toEqual([]);
	});

	it('rejects a pair without a key', () => {
		expect(() => parseKeyValuePairs('A=1,novalue')).toThrow(
			'Invalid key-value pair: "novalue". Must be "key=value"'
		);
		expect(() => parseKeyValuePairs('=1')).toThrow(
			'Invalid key-value pair: "=1". Must be "key=value"'
		);
	});

	it('rejects keys and values the env format cannot hold', () => {
		expect(() => parseKeyValuePairs('COLOR=#ff0000')).toThrow(
			'Invalid key-value pair: "COLOR=#ff0000". Must be "key=value"'
		);
		expect(() => parseKeyValuePairs('#TOKEN=abc')).toThrow(
			'Invalid key-value pair: "#TOKEN=abc". Must be "key=value"'
		);
		expect(() => parseKeyValuePairs('A=one\ntwo')).toThrow(
			'Invalid key-value pair: "A=one\ntwo". Must be "key=value"'
		);
		expect(() => parseKeyValuePairs('A\rB=1')).toThrow(
			'Invalid key-value pair: "A\rB=1". Must be "key=value"'
		);
	});
});
