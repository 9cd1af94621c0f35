/**
 * Thrown when the run is set up with something it cannot work with:
 * an unknown locale, an unknown codec or a codec missing an operation.
 * The whole run stops.
 */
export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigurationError';
	}
}

export class UnknownLocaleError extends ConfigurationError {
	readonly locale: string;

	constructor(locale: string) {
		super(`Unknown locale: ${locale}`);
		this.name = 'UnknownLocaleError';
		this.locale = locale;
	}
}

/**
 * Thrown when the translation service call fails. The original failure is kept as `cause`.
 */
export class TranslationServiceError extends Error {
	readonly targetCode: string;

	constructor(targetCode: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`Translation to ${targetCode} failed: ${reason}`, {cause});
		this.name = 'TranslationServiceError';
		this.targetCode = targetCode;
	}
}
