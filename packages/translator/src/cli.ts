#!/usr/bin/env node
import process from 'node:process';
import chalk from 'chalk';
import {HELP_TEXT, parseCliOptions, type TranslateCommand} from './cli-options.js';
import {codecFor} from './codec.js';
import {ConfigurationError} from './errors.js';
import {createAiTranslator, verifyApiKey} from './service.js';
import {existingTranslationsLoader, translateFile} from './translator.js';

async function run(options: TranslateCommand): Promise<void> {
	const codec = codecFor(options.codec);

	if (options.verify) {
		console.error(chalk.dim(`Verifying ${options.provider} API key...`));
		if (!await verifyApiKey(options.apiKey, options.provider)) {
			throw new ConfigurationError(`The ${options.provider} API key was rejected`);
		}
	}

	const result = await translateFile({
		source: options.source,
		destination: options.destination,
		codec,
		locales: options.locales,
		translate: createAiTranslator({
			apiKey: options.apiKey,
			provider: options.provider,
			model: options.model,
			context: options.context,
		}),
		loadExisting: options.existing === undefined ? undefined : existingTranslationsLoader(options.existing),
		onProgress(locale, current, total) {
			console.error(`${chalk.cyan(`[${current}/${total}]`)} Translating ${chalk.bold(locale)}`);
		},
		onLocaleWritten(_locale, content) {
			console.log(content);
			console.log();
		},
	});

	console.error(chalk.green(`Translated ${result.requests} values into ${result.locales.length} locales → ${options.destination}`));
}

async function main(): Promise<void> {
	const options = parseCliOptions(process.argv.slice(2), process.env);
	if (options.command === 'help') {
		console.log(HELP_TEXT);
		return;
	}

	await run(options);
}

try {
	await main();
} catch (error) {
	console.error(chalk.red(error instanceof Error ? `${error.name}: ${error.message}` : String(error)));
	process.exitCode = 1;
}
