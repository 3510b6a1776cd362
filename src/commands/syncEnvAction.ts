import chalk from 'chalk';
import fs from 'fs';

import { createLogger, type Logger } from '@/logs/createLogger';
import { resolveLogLevel } from '@/logs/resolveLogLevel';

import { EnvSyncError } from './EnvSyncError';
import { mergeEnvTemplate } from './mergeEnvTemplate';
import { parseEnvFile } from './parseEnvFile';
import { parseKeyValuePairs } from './parseKeyValuePairs';
import { resolveSyncPaths } from './resolveSyncPaths';
import { serializeEnvEntries } from './serializeEnvEntries';
import { setEnvVariable } from './setEnvVariable';
import type { SyncOptions } from './SyncOptions';
import { writeEnvFile } from './writeEnvFile';

export interface SyncContext {
	cwd?: string;
	log?: Logger;
}

/**
 * Sync the local env file with its template and write the result back to
 * the local path. Returns the synced text.
 */
export function syncEnvAction(
	options: SyncOptions,
	context: SyncContext = {}
): string {
	const log =
		context.log ?? createLogger({ level: resolveLogLevel(options) });

	// 1) Parse --set pairs before touching any file
	const setPairs = options.set ? parseKeyValuePairs(options.set) : [];

	// 2) Resolve paths
	const { localPath, templatePath } = resolveSyncPaths(options, context.cwd);
	log.debug(`Local file: ${localPath}`);
	log.debug(`Template file: ${templatePath}`);

	if (!fs.existsSync(templatePath)) {
		throw new EnvSyncError('TemplateNotFound', templatePath);
	}

	// 3) Create the local file if missing
	const localExists = fs.existsSync(localPath);
	if (!localExists && !options.dryRun) {
		log.debug(`Creating local file: ${localPath}`);
		try {
			fs.writeFileSync(localPath, '', 'utf-8');
		} catch (error) {
			throw new EnvSyncError('CreateLocal', localPath, error);
		}
	}

	// 4) Parse both sides
	const canReadLocal = localExists || !options.dryRun;
	const local = canReadLocal ? parseEnvFile(localPath, 'local') : [];
	const template = parseEnvFile(templatePath, 'template');
	log.debug(
		`Parsed ${local.length} local and ${template.length} template entries`
	);

	// 5) Merge
	let synced = mergeEnvTemplate(local, template, (decision) => {
		if (decision.value) log.trace(`Copying local value for ${decision.key}`);
		if (decision.inlineComment) {
			log.trace(`Copying inline comment for ${decision.key}`);
		}
		if (decision.precedingComments) {
			log.trace(`Copying preceding comments for ${decision.key}`);
		}
	});

	// 6) Apply --set pairs
	for (const [key, value] of setPairs) {
		const result = setEnvVariable(synced, key, value);
		synced = result.entries;
		log.trace(
			result.previous === undefined
				? `Appended ${key}`
				: `Replaced ${key} (was "${result.previous}")`
		);
	}

	const content = serializeEnvEntries(synced);

	// 7) Write, or print under --dry-run
	if (options.dryRun) {
		log.normal(chalk.yellow('[DRY RUN] Would have written:'), localPath);
		// printed at every level, --silent included
		log.output(content.endsWith('\n') ? content.slice(0, -1) : content);
		return content;
	}

	writeEnvFile(localPath, content);
	log.normal(chalk.cyan('Synced:'), localPath);
	return content;
}
