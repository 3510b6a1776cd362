import type { EnvEntry, EnvVariable } from './EnvEntry';
import { findEnvVariable } from './findEnvVariable';

/**
 * Which template fields were filled from the local file, reported per key so
 * the caller can log them.
 */
export interface MergeDecision {
	key: string;
	value: boolean;
	inlineComment: boolean;
	precedingComments: boolean;
}

function mergeVariable(
	templateVar: EnvVariable,
	localVar: EnvVariable
): { merged: EnvVariable; decision: MergeDecision } {
	const takeValue = templateVar.value === '' && localVar.value !== '';
	const takeInline =
		templateVar.inlineComment === undefined &&
		localVar.inlineComment !== undefined;
	const takePreceding =
		templateVar.precedingComments.length === 0 &&
		localVar.precedingComments.length > 0;

	const merged: EnvVariable = {
		...templateVar,
		value: takeValue ? localVar.value : templateVar.value,
		precedingComments: [
			...(takePreceding
				? localVar.precedingComments
				: templateVar.precedingComments),
		],
	};
	if (takeInline) {
		merged.inlineComment = localVar.inlineComment;
	}

	return {
		merged,
		decision: {
			key: templateVar.key,
			value: takeValue,
			inlineComment: takeInline,
			precedingComments: takePreceding,
		},
	};
}

/**
 * Merge a local env document into a template. The template decides which
 * entries exist and in what order; the local document only fills a template
 * variable's empty value, missing inline comment or missing preceding
 * comments. Keys that only exist locally are dropped.
 *
 * Neither input is modified.
 */
export function mergeEnvTemplate(
	local: EnvEntry[],
	template: EnvEntry[],
	onDecision?: (decision: MergeDecision) => void
): EnvEntry[] {
	return template.map((entry): EnvEntry => {
		if (entry.type !== 'variable') return { ...entry };

		const localVar = findEnvVariable(local, entry.key);
		if (!localVar) {
			return { ...entry, precedingComments: [...entry.precedingComments] };
		}

		const { merged, decision } = mergeVariable(entry, localVar);
		onDecision?.(decision);
		return merged;
	});
}
