import {DEFAULT_MODELS} from './consts.js';
import {ConfigurationError, UnknownLocaleError} from './errors.js';
import {isKnownLocale, nonEnglishLocales} from './locales.js';
import {API_KEY_VARIABLES, isProvider, PROVIDERS, type Provider} from './service.js';

export type TranslateCommand = {
	command: 'translate';
	source: string;
	destination: string;
	provider: Provider;
	model: string;
	apiKey: string;
	context: string;
	/** Undefined means every non-base locale */
	locales?: string[];
	/** Directory holding `<locale>.yml` files already translated */
	existing?: string;
	codec: string;
	verify: boolean;
};

export type CliOptions = {command: 'help'} | TranslateCommand;

export const HELP_TEXT = `Usage: line-translate --source <file> --destination <file> [options]

Options:
  --source <file>        Base-language resource file (key: value lines)
  --destination <file>   File the translated blocks are appended to
  --provider <name>      ${PROVIDERS.join(' | ')} (default: gemini)
  --model <id>           Model id (default depends on the provider)
  --api-key <key>        API key (default: the provider's environment variable)
  --context <text>       Product context added to every prompt
  --locales <list>       Comma-separated platform locales, e.g. fr-FR,de-DE
  --non-english          Only translate locales that are not English variants
  --existing <dir>       Skip keys already translated in <dir>/<locale>.yml
  --codec <name>         Resource format (default: yaml)
  --verify               Check the API key before translating
  --help                 Show this message`;

const VALUE_FLAGS = new Set(['source', 'destination', 'provider', 'model', 'api-key', 'context', 'locales', 'existing', 'codec']);
const BOOLEAN_FLAGS = new Set(['non-english', 'verify', 'help']);

type Environment = Record<string, string | undefined>;

function readFlags(argv: readonly string[]): Map<string, string | true> {
	const flags = new Map<string, string | true>();

	for (let index = 0; index < argv.length; index++) {
		const argument = argv[index] ?? '';
		if (!argument.startsWith('--')) {
			throw new ConfigurationError(`Unexpected argument: ${argument}`);
		}

		const equals = argument.indexOf('=');
		const name = argument.slice(2, equals === -1 ? undefined : equals);

		if (BOOLEAN_FLAGS.has(name)) {
			if (equals !== -1) {
				throw new ConfigurationError(`Option --${name} takes no value`);
			}

			flags.set(name, true);
			continue;
		}

		if (!VALUE_FLAGS.has(name)) {
			throw new ConfigurationError(`Unknown option: --${name}`);
		}

		let value: string | undefined;
		if (equals === -1) {
			const next = argv[index + 1];
			value = next !== undefined && !next.startsWith('--') ? next : undefined;
			index++;
		} else {
			value = argument.slice(equals + 1);
		}

		if (value === undefined || value === '') {
			throw new ConfigurationError(`Option --${name} needs a value`);
		}

		flags.set(name, value);
	}

	return flags;
}

function requiredFlag(flags: Map<string, string | true>, name: string): string {
	const value = flags.get(name);
	if (typeof value !== 'string') {
		throw new ConfigurationError(`Missing required option --${name}`);
	}

	return value;
}

function optionalFlag(flags: Map<string, string | true>, name: string): string | undefined {
	const value = flags.get(name);
	return typeof value === 'string' ? value : undefined;
}

function parseLocales(list: string): string[] {
	const locales = list.split(',').map(locale => locale.trim()).filter(locale => locale !== '');
	for (const locale of locales) {
		if (!isKnownLocale(locale)) {
			throw new UnknownLocaleError(locale);
		}
	}

	return locales;
}

/**
 * Parses command line arguments (without the node and script paths).
 * @throws {ConfigurationError} On unknown, missing or conflicting options
 */
export function parseCliOptions(argv: readonly string[], env: Environment): CliOptions {
	const flags = readFlags(argv);
	if (flags.has('help')) {
		return {command: 'help'};
	}

	const provider = optionalFlag(flags, 'provider') ?? 'gemini';
	if (!isProvider(provider)) {
		throw new ConfigurationError(`Unknown provider: ${provider}. Available: ${PROVIDERS.join(', ')}`);
	}

	const apiKey = optionalFlag(flags, 'api-key') ?? env[API_KEY_VARIABLES[provider]];
	if (!apiKey) {
		throw new ConfigurationError(`Missing API key: pass --api-key or set ${API_KEY_VARIABLES[provider]}`);
	}

	const localeList = optionalFlag(flags, 'locales');
	if (localeList !== undefined && flags.has('non-english')) {
		throw new ConfigurationError('Use either --locales or --non-english, not both');
	}

	let locales: string[] | undefined;
	if (localeList !== undefined) {
		locales = parseLocales(localeList);
	} else if (flags.has('non-english')) {
		locales = nonEnglishLocales().map(entry => entry.sourceLocale);
	}

	return {
		command: 'translate',
		source: requiredFlag(flags, 'source'),
		destination: requiredFlag(flags, 'destination'),
		provider,
		model: optionalFlag(flags, 'model') ?? DEFAULT_MODELS[provider],
		apiKey,
		context: optionalFlag(flags, 'context') ?? '',
		locales,
		existing: optionalFlag(flags, 'existing'),
		codec: optionalFlag(flags, 'codec') ?? 'yaml',
		verify: flags.has('verify'),
	};
}
