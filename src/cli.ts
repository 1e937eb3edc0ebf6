#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';

import { checkCommand } from './commands/check.command';
import { parseCommand } from './commands/parse.command';
import { runCommand } from './commands/run.command';

const packageJsonPath = path.resolve(__dirname, '..', 'package.json');
const packageJson: { version?: string } = JSON.parse(
	fs.readFileSync(packageJsonPath, 'utf-8')
);
const VERSION = packageJson.version || '0.0.0';

const program = new Command();

program
	.name('envlex')
	.description('Parse, validate and apply .env files')
	.version(`v${VERSION}`, '-v, --version', 'Display the version')
	.helpOption('-h, --help', 'Display help message')
	.enablePositionalOptions();

program
	.command('parse')
	.description('Parse a .env file and print the resulting variables')
	.option('-f, --format <format>', 'Output format: env or json', 'env')
	.option('--silent', 'Suppress all log output')
	.option('--verbose', 'Log each step')
	.argument('[file]', 'File to parse', '.env')
	.action(parseCommand);

program
	.command('check')
	.description('Validate .env files and report the first error of each')
	.option('--silent', 'Suppress all log output')
	.option('--verbose', 'Log each step')
	.argument('<files...>', 'Files to check')
	.action(checkCommand);

program
	.command('run')
	.description('Run a command with the variables of a .env file applied')
	.option(
		'--no-override',
		'Keep variables that are already set in the environment'
	)
	.option('--silent', 'Suppress all log output')
	.option('--verbose', 'Log each step')
	.argument('<file>', '.env file to load')
	.argument('<command>', 'Command to run')
	.argument('[args...]', 'Arguments passed to the command')
	.passThroughOptions()
	.action(runCommand);

program.parse(process.argv);
