/** Thrown by the parser for a non-empty, non-comment line without `=`. */
export class InvalidLineError extends Error {
	readonly line: string;

	constructor(line: string) {
		super(`Invalid line: ${line}`);
		this.name = 'InvalidLineError';
		this.line = line;
	}
}
