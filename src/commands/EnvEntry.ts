export type EnvVariable = {
	type: 'variable';
	key: string;
	value: string;
	precedingComments: string[];
	inlineComment?: string;
};

export type EnvEntry =
	| EnvVariable
	| { type: 'comment'; text: string }
	| { type: 'blank' };
