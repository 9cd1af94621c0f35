/**
 * line-translator - machine translation for line-oriented localization files
 *
 * Reads a base-language `key: value` resource file, translates every value
 * into the platform's other locales through an AI model, repairs the usual
 * machine-translation artifacts and appends one block per locale to a
 * destination file.
 *
 * @packageDocumentation
 */

export {
	translateFile,
	existingTranslationsLoader,
	type TranslateFileOptions,
	type TranslateFileResult,
} from './translator.js';
export {
	translateLocale,
	createKeyCatalog,
	splitLines,
	type KeyCatalog,
	type LocaleTranslationOptions,
} from './pipeline.js';
export {
	createAiTranslator,
	createLanguageModel,
	verifyApiKey,
	isProvider,
	PROVIDERS,
	API_KEY_VARIABLES,
	type TranslateFunction,
	type TranslationRequest,
	type TranslateOptions,
	type Model,
	type Provider,
} from './service.js';
export {normalizeTranslation, NORMALIZATION_RULES, type NormalizationRule} from './normalize.js';
export {yamlLineCodec, codecFor, assertCodec, type LineCodec, type Line} from './codec.js';
export {
	LOCALES,
	serviceCodeFor,
	nonEnglishLocales,
	nonBaseLocales,
	isKnownLocale,
	isChineseLocale,
	type LocaleEntry,
} from './locales.js';
export {appendBlock, translationHeader} from './writer.js';
export {ConfigurationError, UnknownLocaleError, TranslationServiceError} from './errors.js';
export {SOURCE_LANGUAGE, BASE_LOCALE, LANGUAGE_NAMES} from './consts.js';
