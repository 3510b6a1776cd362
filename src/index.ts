#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';

import { DEFAULT_TEMPLATE_FILENAME } from './commands/constants';
import { syncCommand } from './commands/sync.command';

// dist/index.js sits one level below package.json
const packageJsonPath = path.resolve(__dirname, '..', 'package.json');

function readVersion(): string {
	const packageJson: unknown = JSON.parse(
		fs.readFileSync(packageJsonPath, 'utf-8')
	);
	if (
		typeof packageJson === 'object' &&
		packageJson !== null &&
		'version' in packageJson &&
		typeof packageJson.version === 'string'
	) {
		return packageJson.version;
	}
	return '0.0.0';
}

function increaseVerbosity(_value: string, previous: number): number {
	return previous + 1;
}

const program = new Command();

program
	.name('env-sync')
	.description(
		'Easily update your local env file with a git-trackable template'
	)
	.version(`v${readVersion()}`, '-V, --version', 'Display the version')
	.helpOption('-h, --help', 'Display help message')
	.option(
		'-l, --local <path>',
		'Path to the local .env file (default: .env in the working directory)'
	)
	.option(
		'-t, --template <path>',
		'Path to the template file',
		DEFAULT_TEMPLATE_FILENAME
	)
	.option(
		'--set <pairs>',
		'Comma separated list of KEY=value to set after syncing'
	)
	.option('--dry-run', 'Do not write any files, print the synced content')
	.option('-s, --silent', 'Only print errors')
	.option(
		'-v, --verbose',
		'Verbose output (-v for debug, -vv for trace)',
		increaseVerbosity,
		0
	)
	.action(syncCommand);

program.parse(process.argv);
