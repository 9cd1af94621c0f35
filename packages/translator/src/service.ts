import {createAnthropic} from '@ai-sdk/anthropic';
import {createGoogleGenerativeAI} from '@ai-sdk/google';
import {createOpenAI} from '@ai-sdk/openai';
import {generateText, type LanguageModel} from 'ai';
import type {SOURCE_LANGUAGE} from './consts.js';
import {TranslationServiceError} from './errors.js';
import {buildSystemPrompt, buildTranslationPrompt} from './prompts.js';

export type Provider = 'gemini' | 'openai' | 'anthropic';

export type Model = string;

export const PROVIDERS: readonly Provider[] = ['gemini', 'openai', 'anthropic'];

/**
 * Environment variable each provider reads its API key from.
 */
export const API_KEY_VARIABLES: Record<Provider, string> = {
	gemini: 'GOOGLE_GENERATIVE_AI_API_KEY',
	openai: 'OPENAI_API_KEY',
	anthropic: 'ANTHROPIC_API_KEY',
};

export function isProvider(value: string): value is Provider {
	return PROVIDERS.some(provider => provider === value);
}

export type TranslationRequest = {
	text: string;
	sourceLanguage: typeof SOURCE_LANGUAGE;
	targetCode: string;
};

/**
 * The only thing the pipeline needs from a translation service.
 * Resolves to the raw translated text.
 */
export type TranslateFunction = (request: TranslationRequest) => Promise<string>;

export type TranslateOptions = {
	apiKey: string;
	provider: Provider;
	model: Model;
	/** Product context included in every prompt */
	context?: string;
	/** Used instead of the provider model when set */
	aiModel?: LanguageModel;
};

export function createLanguageModel(provider: Provider, apiKey: string, model: Model): LanguageModel {
	switch (provider) {
		case 'gemini': {
			return createGoogleGenerativeAI({apiKey})(model);
		}

		case 'openai': {
			return createOpenAI({apiKey})(model);
		}

		case 'anthropic': {
			return createAnthropic({apiKey})(model);
		}
	}
}

/**
 * Creates a translate function backed by an AI model.
 *
 * Every request is a single call. Line breaks around the model's reply are
 * removed. Failures are not retried; they are rethrown as
 * {@link TranslationServiceError}.
 */
export function createAiTranslator(options: TranslateOptions): TranslateFunction {
	const model = options.aiModel ?? createLanguageModel(options.provider, options.apiKey, options.model);
	const context = options.context ?? '';

	return async request => {
		const systemPrompt = buildSystemPrompt(request.sourceLanguage, request.targetCode, context);

		try {
			const {text} = await generateText({
				model,
				prompt: buildTranslationPrompt(systemPrompt, request.text),
				maxRetries: 0,
			});
			// Resource values are single lines; a no-break space is left for the normalizer
			return text.replaceAll(/^[\r\n]+|[\r\n]+$/g, '');
		} catch (error) {
			throw new TranslationServiceError(request.targetCode, error);
		}
	};
}

/**
 * Checks an API key against the provider's model listing.
 * Resolves to `false` for a rejected key or an unreachable provider.
 */
export async function verifyApiKey(apiKey: string, provider: Provider): Promise<boolean> {
	try {
		switch (provider) {
			case 'gemini': {
				const response = await fetch(`https://generativelanguage.googleapis.com/v1beta/models?key=${encodeURIComponent(apiKey)}`);
				return response.ok;
			}

			case 'openai': {
				const response = await fetch('https://api.openai.com/v1/models', {
					headers: {authorization: `Bearer ${apiKey}`},
				});
				return response.ok;
			}

			case 'anthropic': {
				const response = await fetch('https://api.anthropic.com/v1/models', {
					headers: {
						'x-api-key': apiKey,
						'anthropic-version': '2023-06-01',
					},
				});
				return response.ok;
			}
		}
	} catch {
		return false;
	}
}
