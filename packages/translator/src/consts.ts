/**
 * The language name sent to the translation service for every source value.
 */
export const SOURCE_LANGUAGE = 'ENGLISH';

/**
 * The locale the source file is written in. It is never a translation target.
 */
export const BASE_LOCALE = 'en-US';

/**
 * Key of the row that opens the base-language section of a source file.
 */
export const BASE_SECTION_KEY = 'en';

/**
 * Default model per provider, used when none is given on the command line.
 */
export const DEFAULT_MODELS = {
	gemini: 'gemini-2.0-flash',
	openai: 'gpt-4o-mini',
	anthropic: 'claude-3-5-haiku-latest',
} as const;

/**
 * Mapping of service codes to human-readable language names.
 * Used to provide better context to the AI model in translation prompts.
 */
export const LANGUAGE_NAMES: Record<string, string> = {
	de: 'German',
	en: 'English',
	es: 'Spanish',
	fr: 'French',
	id: 'Indonesian',
	it: 'Italian',
	ko: 'Korean',
	vi: 'Vietnamese',
	'zh-CN': 'Chinese (Simplified)',
	'zh-TW': 'Chinese (Traditional)',
	PORTUGUESE: 'Portuguese',
};
