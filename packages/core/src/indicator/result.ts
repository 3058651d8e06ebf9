export type Action =
	| { readonly type: "buy"; readonly strength: number }
	| { readonly type: "sell"; readonly strength: number }
	| { readonly type: "none" };

export const NO_ACTION: Action = Object.freeze({ type: "none" });

const clampStrength = (strength: number): number =>
	Number.isFinite(strength) ? Math.min(Math.max(strength, 0), 1) : 0;

export const buy = (strength = 1): Action => {
	const clamped = clampStrength(strength);
	return clamped === 0 ? NO_ACTION : { type: "buy", strength: clamped };
};

export const sell = (strength = 1): Action => {
	const clamped = clampStrength(strength);
	return clamped === 0 ? NO_ACTION : { type: "sell", strength: clamped };
};

/** Positive values buy, negative values sell, magnitude capped at 1. */
export const actionFromSigned = (value: number): Action => {
	if (!Number.isFinite(value) || value === 0) {
		return NO_ACTION;
	}
	return value > 0 ? buy(value) : sell(-value);
};

export const actionToSigned = (action: Action): number => {
	switch (action.type) {
		case "buy":
			return action.strength;
		case "sell":
			return -action.strength;
		case "none":
			return 0;
	}
};

/** `[raw value count, signal count]` */
export type ResultSize = readonly [raw: number, signals: number];

export const MAX_RESULT_VALUES = 4;

/**
 * Output of one processed candle: raw indicator values plus trading signals.
 * Arity is fixed per indicator kind and declared by its configuration's `size()`.
 */
export class IndicatorResult {
	private readonly rawValues: readonly number[];
	private readonly rawSignals: readonly Action[];

	private constructor(values: readonly number[], signals: readonly Action[]) {
		this.rawValues = Object.freeze([...values]);
		this.rawSignals = Object.freeze([...signals]);
	}

	static create(
		values: readonly number[],
		signals: readonly Action[] = []
	): IndicatorResult {
		if (values.length > MAX_RESULT_VALUES || signals.length > MAX_RESULT_VALUES) {
			throw new RangeError(
				`IndicatorResult holds at most ${MAX_RESULT_VALUES} values and ${MAX_RESULT_VALUES} signals (got ${values.length}/${signals.length})`
			);
		}
		return new IndicatorResult(values, signals);
	}

	values(): readonly number[] {
		return this.rawValues;
	}

	signals(): readonly Action[] {
		return this.rawSignals;
	}

	/** NaN when `index` is past the raw values. */
	value(index: number): number {
		return this.rawValues[index] ?? Number.NaN;
	}

	signal(index: number): Action {
		return this.rawSignals[index] ?? NO_ACTION;
	}

	size(): ResultSize {
		return [this.rawValues.length, this.rawSignals.length];
	}
}
