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

export const EMA_NAME = "EMA";

export interface EmaParams {
	period: number;
	source: PriceSource;
}

const EMA_SCHEMA: ParameterSchema<EmaParams> = {
	period: periodParameter(),
	source: sourceParameter(),
};

export const emaAlpha = (period: number): number => 2 / (period + 1);

export class EmaConfig extends BaseIndicatorConfig<EmaParams, EmaInstance> {
	protected readonly schema = EMA_SCHEMA;

	constructor(params: Partial<EmaParams> = {}) {
		super({ period: 9, source: "close", ...params });
	}

	name(): string {
		return EMA_NAME;
	}

	validate(): boolean {
		return isValidPeriod(this.params.period);
	}

	size(): ResultSize {
		return [1, 1];
	}

	clone(): EmaConfig {
		return new EmaConfig(this.params);
	}

	protected createInstance(seed: OHLCV): EmaInstance {
		const value = pickSource(seed, this.params.source);
		if (!Number.isFinite(value)) {
			throw new IncompatibleSeedError(
				`EMA cannot start from a non-finite ${this.params.source} (${value})`,
				EMA_NAME
			);
		}
		return new EmaInstance(this, value);
	}
}

export class EmaInstance extends BaseIndicatorInstance<EmaConfig> {
	private readonly alpha: number;
	private readonly source: PriceSource;
	private value: number;
	private previousDiff = 0;

	constructor(config: EmaConfig, seedValue: number) {
		super(config);
		const { period, source } = config.parameters();
		this.alpha = emaAlpha(period);
		this.source = source;
		this.value = seedValue;
	}

	next(candle: OHLCV): IndicatorResult {
		const price = pickSource(candle, this.source);
		this.value += this.alpha * (price - this.value);

		const diff = price - this.value;
		const signal = zeroCross(this.previousDiff, diff);
		this.previousDiff = diff;
		return IndicatorResult.create([this.value], [signal]);
	}
}
