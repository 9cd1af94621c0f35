import {BASE_LOCALE} from './consts.js';
import {UnknownLocaleError} from './errors.js';

export type LocaleEntry = {
	readonly sourceLocale: string;
	readonly serviceCode: string;
};

/**
 * Mapping of the locale identifiers used by the mail platform's resource files
 * to the codes the translation service expects. Several regional variants share
 * a service code.
 */
export const LOCALES: readonly LocaleEntry[] = Object.freeze([
	{sourceLocale: 'de-DE', serviceCode: 'de'},
	{sourceLocale: 'en-MY', serviceCode: 'en'},
	{sourceLocale: 'en-SG', serviceCode: 'en'},
	{sourceLocale: 'es-MX', serviceCode: 'es'},
	{sourceLocale: 'it-IT', serviceCode: 'it'},
	{sourceLocale: 'vi-VN', serviceCode: 'vi'},
	{sourceLocale: 'zh-Hant-TW', serviceCode: 'zh-TW'},
	{sourceLocale: 'en-AA', serviceCode: 'en'},
	{sourceLocale: 'en-NZ', serviceCode: 'en'},
	{sourceLocale: 'en-US', serviceCode: 'en'},
	{sourceLocale: 'fr-FR', serviceCode: 'fr'},
	{sourceLocale: 'ko-KR', serviceCode: 'ko'},
	{sourceLocale: 'zh-Hans-CN', serviceCode: 'zh-CN'},
	{sourceLocale: 'en-AU', serviceCode: 'en'},
	{sourceLocale: 'en-PH', serviceCode: 'en'},
	{sourceLocale: 'es-ES', serviceCode: 'es'},
	{sourceLocale: 'id-ID', serviceCode: 'id'},
	{sourceLocale: 'pt-BR', serviceCode: 'PORTUGUESE'},
	{sourceLocale: 'zh-Hant-HK', serviceCode: 'zh-CN'},
].map(entry => Object.freeze(entry)));

const serviceCodes = new Map(LOCALES.map(entry => [entry.sourceLocale, entry.serviceCode]));

export function isKnownLocale(sourceLocale: string): boolean {
	return serviceCodes.has(sourceLocale);
}

/**
 * Resolves the translation service code for a platform locale.
 * @throws {UnknownLocaleError} When the locale is not in the table
 */
export function serviceCodeFor(sourceLocale: string): string {
	const code = serviceCodes.get(sourceLocale);
	if (code === undefined) {
		throw new UnknownLocaleError(sourceLocale);
	}

	return code;
}

/**
 * Every locale whose identifier does not start with `en`.
 */
export function nonEnglishLocales(): LocaleEntry[] {
	return LOCALES.filter(entry => !entry.sourceLocale.startsWith('en'));
}

/**
 * Every locale except the base locale.
 */
export function nonBaseLocales(): LocaleEntry[] {
	return LOCALES.filter(entry => entry.sourceLocale !== BASE_LOCALE);
}

export function isChineseLocale(sourceLocale: string): boolean {
	return sourceLocale.includes('zh');
}
