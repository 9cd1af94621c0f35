import {isChineseLocale} from './locales.js';

/**
 * One substitution applied to machine-translated text. Rules never fail;
 * a rule whose pattern does not occur returns the value unchanged.
 */
export type NormalizationRule = {
	readonly name: string;
	apply(value: string, locale: string): string;
};

// `^` and `$` match at every line boundary.
const rules: NormalizationRule[] = [
	{
		name: 'strip-strong-for-chinese',
		apply: (value, locale) => isChineseLocale(locale)
			? value.replaceAll('<strong>', '').replaceAll('</strong>', '')
			: value,
	},
	{
		name: 'strip-leading-no-break-space',
		apply: value => value.replaceAll(/^\u00A0/gm, ''),
	},
	{
		name: 'collapse-space-before-bracket',
		apply: value => value.replaceAll(' ]', ']'),
	},
	{
		name: 'guillemets-to-quotes',
		apply: value => value.replaceAll('«', '"').replaceAll('»', '"'),
	},
	{
		name: 'period-inside-closing-quote',
		apply: value => value.replaceAll(/"\.$/gm, '."'),
	},
	{
		name: 'escaped-space-quote',
		apply: value => value.replaceAll('\\ "', '\\"'),
	},
	{
		name: 'closing-tag-space',
		apply: value => value.replaceAll('</ ', '</'),
	},
	{
		name: 'curly-quotes',
		apply: value => value.replaceAll(/[“”]/g, '"'),
	},
	{
		name: 'trim-inside-strong',
		apply: value => value.replaceAll('<strong> ', '<strong>').replaceAll(' </strong>', '</strong>'),
	},
	{
		name: 'decode-quote-entities',
		apply: value => value.replaceAll('&quot;', '"').replaceAll('&#39;', '"'),
	},
	{
		name: 'collapse-greater-than-entity',
		apply: value => value.replaceAll('&gt; ', '>'),
	},
	{
		// Double quotes are kept for the wrapping of the whole value.
		name: 'double-to-single-quotes',
		apply: value => value.replaceAll('"', '\''),
	},
	{
		name: 'restore-outer-quotes',
		apply: value => value.replaceAll(/^'/gm, '"').replaceAll(/'$/gm, '"'),
	},
	{
		name: 'escape-quote-before-o',
		apply: value => value.replaceAll(' "O', ' \\"O'),
	},
	{
		name: 'brace-placeholders',
		apply: value => value
			.replaceAll('(0)', '{0}')
			.replaceAll('(1)', '{1}')
			.replaceAll('(2)', '{2}')
			.replaceAll('（0）', '{0}'),
	},
	{
		name: 'wrap-in-quotes',
		apply(value) {
			let wrapped = value;
			if (!/"$/m.test(wrapped)) {
				wrapped = `${wrapped}"`;
			}

			if (!/^"/m.test(wrapped)) {
				wrapped = `"${wrapped}`;
			}

			return wrapped;
		},
	},
	{
		name: 'trim',
		apply: value => value.trim(),
	},
];

/**
 * The repair rules, in the order they run. Later rules rely on the shape the
 * earlier ones leave behind, so the order is part of the output format.
 */
export const NORMALIZATION_RULES: readonly NormalizationRule[] = Object.freeze(rules);

/**
 * Repairs machine-translation artifacts and wraps the value in double quotes
 * for the YAML resource file.
 *
 * @param translated - Raw text returned by the translation service
 * @param locale - Platform locale the text was translated for, e.g. `zh-Hans-CN`
 */
export function normalizeTranslation(translated: string, locale: string): string {
	return NORMALIZATION_RULES.reduce((value, rule) => rule.apply(value, locale), translated);
}
