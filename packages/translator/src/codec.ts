import yaml from 'js-yaml';
import {ConfigurationError} from './errors.js';

export type Line =
	| {kind: 'comment'}
	| {kind: 'blank'}
	| {kind: 'entry'; key: string; value: string};

/**
 * Reads and writes one localization format, one line at a time.
 * The pipeline only talks to this interface, so another format is added
 * by writing another codec.
 */
export type LineCodec = {
	readonly name: string;
	isComment(line: string): boolean;
	classify(line: string): Line;
	format(key: string, value: string): string;
	/**
	 * Parses a whole document of the format into a flat key → value record.
	 */
	parseCatalog(content: string): Record<string, string>;
};

const COMMENT_MARKER = '#';

function isCommentLine(line: string): boolean {
	return line.trimStart().startsWith(COMMENT_MARKER);
}

function flattenInto(catalog: Record<string, string>, node: unknown): void {
	if (node === null || typeof node !== 'object' || Array.isArray(node)) {
		return;
	}

	for (const [key, value] of Object.entries(node)) {
		if (value !== null && typeof value === 'object') {
			flattenInto(catalog, value);
		} else {
			catalog[key] = value === null || value === undefined ? '' : String(value);
		}
	}
}

/**
 * The `key: value` line format of the platform's YAML resource files.
 */
export const yamlLineCodec: LineCodec = {
	name: 'yaml',

	isComment: isCommentLine,

	classify(line) {
		if (isCommentLine(line)) {
			return {kind: 'comment'};
		}

		const colon = line.indexOf(':');
		if (line.trim() === '' || colon === -1) {
			return {kind: 'blank'};
		}

		const key = line.slice(0, colon).trim();
		if (key === '') {
			return {kind: 'blank'};
		}

		return {kind: 'entry', key, value: line.slice(colon + 1).trim()};
	},

	format(key, value) {
		return `${key}: ${value}`;
	},

	parseCatalog(content) {
		const catalog: Record<string, string> = {};
		flattenInto(catalog, yaml.load(content));
		return catalog;
	},
};

const CODECS: Record<string, LineCodec> = {
	[yamlLineCodec.name]: yamlLineCodec,
};

const REQUIRED_OPERATIONS = ['isComment', 'classify', 'format', 'parseCatalog'] as const;

/**
 * Checks that a codec implements every operation the pipeline calls.
 * @throws {ConfigurationError} When an operation is missing
 */
export function assertCodec(codec: Partial<LineCodec>): asserts codec is LineCodec {
	if (typeof codec.name !== 'string') {
		throw new ConfigurationError('Codec has no name');
	}

	for (const operation of REQUIRED_OPERATIONS) {
		if (typeof codec[operation] !== 'function') {
			throw new ConfigurationError(`Codec ${codec.name ?? '(unnamed)'} does not implement ${operation}`);
		}
	}
}

export function codecFor(name: string): LineCodec {
	const codec = CODECS[name];
	if (!codec) {
		throw new ConfigurationError(`Unknown codec: ${name}. Available: ${Object.keys(CODECS).join(', ')}`);
	}

	return codec;
}
