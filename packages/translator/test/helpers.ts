import type {TranslateFunction, TranslationRequest} from '../src/index.js';

/**
 * Creates a translate function that records its requests.
 * Answers from `responses` by source text, or with `[<targetCode>] <text>`.
 */
export function createFakeTranslator(responses: Record<string, string> = {}) {
	const requests: TranslationRequest[] = [];
	const translate: TranslateFunction = async request => {
		requests.push(request);
		return responses[request.text] ?? `[${request.targetCode}] ${request.text}`;
	};

	return {translate, requests};
}
