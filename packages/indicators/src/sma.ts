import {
	BaseIndicatorConfig,
	BaseIndicatorInstance,
	IncompatibleSeedError,
	IndicatorResult,
	isValidPeriod,
	periodParameter,
	pickSource,
	sourceParameter,
	type OHLCV,
	type ParameterSchema,
	type PriceSource,
	type ResultSize,
} from "@indicore/core";
import { zeroCross } from "./signals";

export const SMA_NAME = "SMA";

export interface SmaParams {
	period: number;
	source: PriceSource;
}

const SMA_SCHEMA: ParameterSchema<SmaParams> = {
	period: periodParameter(),
	source: sourceParameter(),
};

/**
 * Simple moving average.
 * Raw: the average. Signal: source crossing the average.
 */
export class SmaConfig extends BaseIndicatorConfig<SmaParams, SmaInstance> {
	protected readonly schema = SMA_SCHEMA;

	constructor(params: Partial<SmaParams> = {}) {
		super({ period: 9, source: "close", ...params });
	}

	name(): string {
		return SMA_NAME;
	}

	validate(): boolean {
		return isValidPeriod(this.params.period);
	}

	size(): ResultSize {
		return [1, 1];
	}

	clone(): SmaConfig {
		return new SmaConfig(this.params);
	}

	protected createInstance(seed: OHLCV): SmaInstance {
		const value = pickSource(seed, this.params.source);
		if (!Number.isFinite(value)) {
			throw new IncompatibleSeedError(
				`SMA cannot start from a non-finite ${this.params.source} (${value})`,
				SMA_NAME
			);
		}
		return new SmaInstance(this, value);
	}
}

// Window starts filled with the seed value, so output is defined from the first candle.
export class SmaInstance extends BaseIndicatorInstance<SmaConfig> {
	private readonly window: number[];
	private readonly period: number;
	private readonly source: PriceSource;
	private index = 0;
	private sum: number;
	private previousDiff = 0;

	constructor(config: SmaConfig, seedValue: number) {
		super(config);
		const { period, source } = config.parameters();
		this.period = period;
		this.source = source;
		this.window = new Array<number>(period).fill(seedValue);
		this.sum = seedValue * period;
	}

	next(candle: OHLCV): IndicatorResult {
		const value = pickSource(candle, this.source);
		this.sum += value - this.window[this.index];
		this.window[this.index] = value;
		this.index = (this.index + 1) % this.period;

		const average = this.sum / this.period;
		const diff = value - average;
		const signal = zeroCross(this.previousDiff, diff);
		this.previousDiff = diff;
		return IndicatorResult.create([average], [signal]);
	}
}
