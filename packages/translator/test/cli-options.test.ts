import test from 'ava';
import {parseCliOptions} from '../src/cli-options.js';
import {ConfigurationError, UnknownLocaleError} from '../src/index.js';

const env = {GOOGLE_GENERATIVE_AI_API_KEY: 'test-gemini-key'};

test('parseCliOptions fills in defaults', t => {
	t.deepEqual(parseCliOptions(['--source', 'en.yml', '--destination', 'out.yml'], env), {
		command: 'translate',
		source: 'en.yml',
		destination: 'out.yml',
		provider: 'gemini',
		model: 'gemini-2.0-flash',
		apiKey: 'test-gemini-key',
		context: '',
		locales: undefined,
		existing: undefined,
		codec: 'yaml',
		verify: false,
	});
});

test('parseCliOptions accepts --name=value and boolean flags', t => {
	const options = parseCliOptions([
		'--source=en.yml',
		'--destination=out.yml',
		'--provider=openai',
		'--model=gpt-4o',
		'--api-key=test-secret',
		'--context=Webmail client',
		'--locales=fr-FR, de-DE',
		'--existing=translations',
		'--verify',
	], {});

	t.like(options, {
		command: 'translate',
		provider: 'openai',
		model: 'gpt-4o',
		apiKey: 'test-secret',
		context: 'Webmail client',
		locales: ['fr-FR', 'de-DE'],
		existing: 'translations',
		verify: true,
	});
});

test('parseCliOptions reads the API key of the chosen provider', t => {
	const options = parseCliOptions(['--source', 'a', '--destination', 'b', '--provider', 'anthropic'], {ANTHROPIC_API_KEY: 'test-anthropic-key'});

	t.like(options, {provider: 'anthropic', apiKey: 'test-anthropic-key', model: 'claude-3-5-haiku-latest'});
});

test('--non-english selects the non-English locales', t => {
	const options = parseCliOptions(['--source', 'a', '--destination', 'b', '--non-english'], env);

	t.is(options.command, 'translate');
	if (options.command === 'translate') {
		t.is(options.locales?.length, 12);
		t.false(options.locales?.some(locale => locale.startsWith('en')));
	}
});

test('--help wins over everything else', t => {
	t.deepEqual(parseCliOptions(['--help', '--source', 'a'], {}), {command: 'help'});
});

test('parseCliOptions reports configuration errors', t => {
	const cases: Array<[string[], Record<string, string>, string]> = [
		[['--destination', 'b'], env, 'Missing required option --source'],
		[['--source', 'a', '--destination', 'b'], {}, 'Missing API key: pass --api-key or set GOOGLE_GENERATIVE_AI_API_KEY'],
		[['--source', 'a', '--destination', 'b', '--provider', 'deepl'], env, 'Unknown provider: deepl. Available: gemini, openai, anthropic'],
		[['--source', 'a', '--destination', 'b', '--dry-run'], env, 'Unknown option: --dry-run'],
		[['--source', '--destination', 'b'], env, 'Option --source needs a value'],
		[['--source', 'a', '--destination', 'b', '--verify=false'], env, 'Option --verify takes no value'],
		[['--source', 'a', '--destination', 'b', '--non-english=yes'], env, 'Option --non-english takes no value'],
		[['en.yml'], env, 'Unexpected argument: en.yml'],
		[['--source', 'a', '--destination', 'b', '--locales', 'fr-FR', '--non-english'], env, 'Use either --locales or --non-english, not both'],
	];

	for (const [argv, environment, message] of cases) {
		t.throws(() => parseCliOptions(argv, environment), {instanceOf: ConfigurationError, message}, message);
	}
});

test('parseCliOptions rejects unknown locales', t => {
	t.throws(() => parseCliOptions(['--source', 'a', '--destination', 'b', '--locales', 'fr-FR,xx-XX'], env), {
		instanceOf: UnknownLocaleError,
		message: 'Unknown locale: xx-XX',
	});
});
