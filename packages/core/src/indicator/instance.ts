import type { OHLCV } from "../types";
import type { IndicatorResult, ResultSize } from "./result";

/**
 * Streaming state built by a configuration's `init`.
 *
 * `next` and `over` never throw: numeric edge cases surface as NaN or
 * another sentinel inside the result instead.
 */
export interface IndicatorInstance<TConfig = unknown> {
	/** Advances the state by one candle. */
	next(candle: OHLCV): IndicatorResult;

	/** Runs `next` over every input in order, one result per candle. */
	over(inputs: readonly OHLCV[]): IndicatorResult[];

	/** The configuration this state was built from. */
	config(): Readonly<TConfig>;

	size(): ResultSize;

	name(): string;
}

interface DescribedConfig {
	name(): string;
	size(): ResultSize;
}

export abstract class BaseIndicatorInstance<TConfig extends DescribedConfig>
	implements IndicatorInstance<TConfig>
{
	constructor(protected readonly cfg: TConfig) {}

	abstract next(candle: OHLCV): IndicatorResult;

	over(inputs: readonly OHLCV[]): IndicatorResult[] {
		const results: IndicatorResult[] = [];
		for (const candle of inputs) {
			results.push(this.next(candle));
		}
		return results;
	}

	config(): Readonly<TConfig> {
		return this.cfg;
	}

	size(): ResultSize {
		return this.cfg.size();
	}

	name(): string {
		return this.cfg.name();
	}
}
