export type IndicatorErrorKind = "InvalidParameter" | "IncompatibleSeed" | "Domain";

/**
 * Base class for every failure raised by configurations.
 * `kind` discriminates the taxonomy for callers that catch `unknown`.
 */
export abstract class IndicatorError extends Error {
	abstract readonly kind: IndicatorErrorKind;

	constructor(
		message: string,
		readonly indicator?: string
	) {
		super(message);
		this.name = new.target.name;
	}
}

export class InvalidParameterError extends IndicatorError {
	readonly kind = "InvalidParameter" as const;
	readonly parameter?: string;
	readonly value?: string;

	constructor(
		message: string,
		options: { indicator?: string; parameter?: string; value?: string } = {}
	) {
		super(message, options.indicator);
		this.parameter = options.parameter;
		this.value = options.value;
	}
}

export class IncompatibleSeedError extends IndicatorError {
	readonly kind = "IncompatibleSeed" as const;
}

/** Indicator-specific failure; the core forwards it untouched. */
export class IndicatorDomainError extends IndicatorError {
	readonly kind = "Domain" as const;
}

export const isIndicatorError = (value: unknown): value is IndicatorError =>
	value instanceof IndicatorError;
