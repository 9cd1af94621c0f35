import test from 'ava';
import {
	ConfigurationError,
	TranslationServiceError,
	createKeyCatalog,
	splitLines,
	translateLocale,
	yamlLineCodec as codec,
} from '../src/index.js';
import {createFakeTranslator} from './helpers.js';

const source = [
	'# Mail resource strings',
	'en:',
	'  greeting: Hello {0}, welcome!',
	'  empty_label:',
	'',
	'  farewell: Goodbye',
	'not a key line',
];

test('translateLocale translates every non-empty value for the locale', async t => {
	const {translate, requests} = createFakeTranslator({'Hello {0}, welcome!': 'Bonjour (0), bienvenue !'});

	const output = await translateLocale({lines: source, locale: 'fr-FR', codec, translate});

	t.is(output, [
		'fr-FR: ',
		'greeting: "Bonjour {0}, bienvenue !"',
		'empty_label: ',
		'farewell: "[fr] Goodbye"',
	].join('\n'));
	t.deepEqual(requests, [
		{text: 'Hello {0}, welcome!', sourceLanguage: 'ENGLISH', targetCode: 'fr'},
		{text: 'Goodbye', sourceLanguage: 'ENGLISH', targetCode: 'fr'},
	]);
});

test('translateLocale issues exactly one request for a single entry', async t => {
	const {translate, requests} = createFakeTranslator({'Hello {0}, welcome!': 'Bonjour (0), bienvenue !'});

	const output = await translateLocale({lines: ['greeting: Hello {0}, welcome!'], locale: 'fr-FR', codec, translate});

	t.is(output, 'greeting: "Bonjour {0}, bienvenue !"');
	t.is(requests.length, 1);
});

test('the base section row becomes the locale section row', async t => {
	const {translate} = createFakeTranslator();

	for (const locale of ['de-DE', 'zh-Hans-CN', 'en-AU']) {
		// eslint-disable-next-line no-await-in-loop
		const output = await translateLocale({lines: ['en: ', 'title: Inbox'], locale, codec, translate});
		t.is(splitLines(output)[0], `${locale}: `);
	}
});

test('empty values never reach the translation service', async t => {
	const {translate, requests} = createFakeTranslator();

	const output = await translateLocale({
		lines: ['first:', 'second:    ', 'third:'],
		locale: 'ko-KR',
		codec,
		translate,
	});

	t.is(output, 'first: \nsecond: \nthird: ');
	t.is(requests.length, 0);
});

test('comments and blank lines produce no output', async t => {
	const {translate, requests} = createFakeTranslator();

	const output = await translateLocale({lines: ['# note', '', '   ', '  # indented', 'no colon here'], locale: 'it-IT', codec, translate});

	t.is(output, '');
	t.is(requests.length, 0);
});

test('Chinese locales get strong tags stripped from the translation', async t => {
	const {translate} = createFakeTranslator({'<strong>New</strong> mail': '<strong>新</strong>邮件'});

	const zh = await translateLocale({lines: ['label: <strong>New</strong> mail'], locale: 'zh-Hans-CN', codec, translate});
	t.is(zh, 'label: "新邮件"');
});

test('non-Chinese locales keep strong tags', async t => {
	const {translate} = createFakeTranslator({'<strong>New</strong> mail': '<strong> Nouveau </strong> courrier'});

	const fr = await translateLocale({lines: ['label: <strong>New</strong> mail'], locale: 'fr-FR', codec, translate});
	t.is(fr, 'label: "<strong>Nouveau</strong> courrier"');
});

test('pt-BR requests use the PORTUGUESE service code', async t => {
	const {translate, requests} = createFakeTranslator();

	await translateLocale({lines: ['title: Inbox'], locale: 'pt-BR', codec, translate});

	t.is(requests[0]?.targetCode, 'PORTUGUESE');
});

test('keys already translated in the catalog are skipped', async t => {
	const {translate, requests} = createFakeTranslator();
	const catalog = createKeyCatalog(codec, ['fr-FR:\n  greeting: "Bonjour"\n  farewell:\n']);

	const output = await translateLocale({lines: source, locale: 'fr-FR', codec, translate, catalog});

	t.is(output, 'fr-FR: \nempty_label: \nfarewell: "[fr] Goodbye"');
	t.deepEqual(requests.map(request => request.text), ['Goodbye']);
});

test('createKeyCatalog merges documents with later ones winning', t => {
	const catalog = createKeyCatalog(codec, ['a: one\nb: two\n', 'b: deux\n']);

	t.deepEqual([...catalog.entries()], [['a', 'one'], ['b', 'deux']]);
});

test('an unknown locale fails before any request', async t => {
	const {translate, requests} = createFakeTranslator();

	await t.throwsAsync(translateLocale({lines: source, locale: 'xx-XX', codec, translate}), {instanceOf: ConfigurationError});
	t.is(requests.length, 0);
});

test('a translation service failure propagates', async t => {
	let calls = 0;
	const failure = new TranslationServiceError('de', new Error('Service unavailable'));

	await t.throwsAsync(translateLocale({
		lines: source,
		locale: 'de-DE',
		codec,
		async translate() {
			calls++;
			throw failure;
		},
	}), {is: failure});
	t.is(calls, 1);
});

test('onRequest is called once per translated key', async t => {
	const {translate} = createFakeTranslator();
	const keys: string[] = [];

	await translateLocale({lines: source, locale: 'es-MX', codec, translate, onRequest: key => keys.push(key)});

	t.deepEqual(keys, ['greeting', 'farewell']);
});

test('splitLines handles both line endings', t => {
	t.deepEqual(splitLines('a: 1\r\nb: 2\n'), ['a: 1', 'b: 2', '']);
});
