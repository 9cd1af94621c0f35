import {LANGUAGE_NAMES} from './consts.js';

function capitalize(name: string): string {
	return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

/**
 * Builds the system prompt for translating a single resource value.
 * @param sourceLanguage - The source language name, e.g. `ENGLISH`
 * @param targetCode - The service code of the target language
 * @param context - Optional product context
 * @returns The system prompt string
 */
export function buildSystemPrompt(sourceLanguage: string, targetCode: string, context: string): string {
	const targetLangName = LANGUAGE_NAMES[targetCode] ?? targetCode;

	let prompt = `You are a professional translator specializing in software localization.
Translate the following UI text from ${capitalize(sourceLanguage)} to ${targetLangName}.

Important guidelines:
- Preserve placeholders like {0}, {1} and {name} exactly as written
- Keep the same tone and formality level
- Use natural, idiomatic expressions in the target language
- Maintain any HTML tags
- Do not add or remove content, only translate
- Reply with the translated text only, without quotes or explanations`;

	if (context) {
		prompt += `\n\nProduct context for better translations:\n${context}`;
	}

	return prompt;
}

/**
 * Builds the full translation prompt for one value.
 * @param systemPrompt - The system prompt from buildSystemPrompt
 * @param text - The source text
 * @returns The complete prompt string
 */
export function buildTranslationPrompt(systemPrompt: string, text: string): string {
	return `${systemPrompt}

Text to translate:

${text}`;
}
