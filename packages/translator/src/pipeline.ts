import type {LineCodec} from './codec.js';
import {BASE_SECTION_KEY, SOURCE_LANGUAGE} from './consts.js';
import {serviceCodeFor} from './locales.js';
import {normalizeTranslation} from './normalize.js';
import type {TranslateFunction} from './service.js';

/**
 * Keys already translated for one locale. Built fresh for every locale
 * and never shared between locales.
 */
export type KeyCatalog = ReadonlyMap<string, string>;

export function createKeyCatalog(codec: LineCodec, documents: readonly string[]): KeyCatalog {
	const catalog = new Map<string, string>();
	for (const document of documents) {
		for (const [key, value] of Object.entries(codec.parseCatalog(document))) {
			catalog.set(key, value);
		}
	}

	return catalog;
}

export type LocaleTranslationOptions = {
	lines: Iterable<string>;
	/** Platform locale, e.g. `fr-FR` */
	locale: string;
	codec: LineCodec;
	translate: TranslateFunction;
	/** Keys with a non-empty value here are not translated again */
	catalog?: KeyCatalog;
	/** Called after every translation request */
	onRequest?: (key: string) => void;
};

export function splitLines(content: string): string[] {
	return content.split(/\r?\n/);
}

/**
 * Translates the source lines for one locale.
 *
 * Comments and blank lines are dropped. The base section row becomes the
 * locale's own section row. Empty values are copied without a request.
 *
 * @returns The locale's lines joined with newlines
 */
export async function translateLocale(options: LocaleTranslationOptions): Promise<string> {
	const {locale, codec, translate, catalog} = options;
	const targetCode = serviceCodeFor(locale);
	const output: string[] = [];

	for (const rawLine of options.lines) {
		const line = codec.classify(rawLine);
		if (line.kind !== 'entry') {
			continue;
		}

		const {key, value} = line;
		if (key === BASE_SECTION_KEY) {
			output.push(codec.format(locale, ''));
			continue;
		}

		if (value.trim() === '') {
			output.push(codec.format(key, ''));
			continue;
		}

		const existing = catalog?.get(key);
		if (existing !== undefined && existing.trim() !== '') {
			continue;
		}

		// Requests run one at a time, in file order
		// eslint-disable-next-line no-await-in-loop
		const translated = await translate({text: value, sourceLanguage: SOURCE_LANGUAGE, targetCode});
		options.onRequest?.(key);
		output.push(codec.format(key, normalizeTranslation(translated, locale)));
	}

	return output.join('\n');
}
