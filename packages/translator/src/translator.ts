import {readFile} from 'node:fs/promises';
import path from 'node:path';
import {assertCodec, type LineCodec, yamlLineCodec} from './codec.js';
import {nonBaseLocales, serviceCodeFor} from './locales.js';
import {createKeyCatalog, splitLines, translateLocale} from './pipeline.js';
import type {TranslateFunction} from './service.js';
import {appendBlock, translationHeader} from './writer.js';

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads `<dir>/<locale>.yml`, or nothing when the locale has no file yet.
 */
export function existingTranslationsLoader(directory: string): (locale: string) => Promise<string[]> {
	return async (locale: string): Promise<string[]> => {
		try {
			return [await readFile(path.join(directory, `${locale}.yml`), 'utf8')];
		} catch (error) {
			if (isMissingFile(error)) {
				return [];
			}

			throw error;
		}
	};
}

export type TranslateFileOptions = {
	/** Path of the base-language resource file */
	source: string;
	/** Path of the file the locale blocks are appended to */
	destination: string;
	translate: TranslateFunction;
	codec?: LineCodec;
	/** Platform locales to translate into. Defaults to every non-base locale. */
	locales?: readonly string[];
	/**
	 * Loads the documents already translated for a locale. Keys found there
	 * are skipped.
	 */
	loadExisting?: (locale: string) => Promise<readonly string[]>;
	now?: () => Date;
	/**
	 * Called before each locale is translated.
	 * @param locale - The locale about to be translated
	 * @param current - 1-based position of the locale in the run
	 * @param total - Number of locales in the run
	 */
	onProgress?: (locale: string, current: number, total: number) => void;
	/** Called after a locale's block was appended */
	onLocaleWritten?: (locale: string, content: string) => void;
};

export type TranslateFileResult = {
	/** Locales whose block was appended, in order */
	locales: string[];
	/** Number of translation requests made */
	requests: number;
};

/**
 * Translates a resource file into every target locale, one locale after another,
 * and appends one block per locale to the destination.
 *
 * A failure stops the run. Blocks appended before the failure stay in the file.
 */
export async function translateFile(options: TranslateFileOptions): Promise<TranslateFileResult> {
	const codec = options.codec ?? yamlLineCodec;
	assertCodec(codec);

	const locales = options.locales ?? nonBaseLocales().map(entry => entry.sourceLocale);
	for (const locale of locales) {
		serviceCodeFor(locale);
	}

	const now = options.now ?? (() => new Date());
	await appendBlock(options.destination, translationHeader(now()));

	const result: TranslateFileResult = {locales: [], requests: 0};

	/* eslint-disable no-await-in-loop */
	for (const [index, locale] of locales.entries()) {
		options.onProgress?.(locale, index + 1, locales.length);

		const source = await readFile(options.source, 'utf8');
		const catalog = options.loadExisting
			? createKeyCatalog(codec, await options.loadExisting(locale))
			: undefined;

		const content = await translateLocale({
			lines: splitLines(source),
			locale,
			codec,
			translate: options.translate,
			catalog,
			onRequest() {
				result.requests++;
			},
		});

		if (await appendBlock(options.destination, content)) {
			result.locales.push(locale);
			options.onLocaleWritten?.(locale, content);
		}
	}
	/* eslint-enable no-await-in-loop */

	return result;
}
