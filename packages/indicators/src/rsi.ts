import {
	BaseIndicatorConfig,
	BaseIndicatorInstance,
	buy,
	IncompatibleSeedError,
	IndicatorResult,
	isValidPeriod,
	periodParameter,
	NO_ACTION,
	numberParameter,
	sell,
	type Action,
	type OHLCV,
	type ParameterSchema,
	type ResultSize,
} from "@indicore/core";

export const RSI_NAME = "RSI";

export interface RsiParams {
	period: number;
	/** Oversold threshold in RSI points; overbought is `100 - zone`. */
	zone: number;
}

const RSI_SCHEMA: ParameterSchema<RsiParams> = {
	period: periodParameter(2),
	zone: numberParameter({ gt: 0, lt: 50 }),
};

/**
 * Wilder's relative strength index on closes, 0..100.
 * Signal: buy when leaving the oversold zone upwards, sell when leaving the
 * overbought zone downwards.
 */
export class RsiConfig extends BaseIndicatorConfig<RsiParams, RsiInstance> {
	protected readonly schema = RSI_SCHEMA;

	constructor(params: Partial<RsiParams> = {}) {
		super({ period: 14, zone: 30, ...params });
	}

	name(): string {
		return RSI_NAME;
	}

	validate(): boolean {
		const { period, zone } = this.params;
		return isValidPeriod(period, 2) && zone > 0 && zone < 50;
	}

	size(): ResultSize {
		return [1, 1];
	}

	clone(): RsiConfig {
		return new RsiConfig(this.params);
	}

	protected createInstance(seed: OHLCV): RsiInstance {
		if (!Number.isFinite(seed.close)) {
			throw new IncompatibleSeedError(
				`RSI cannot start from a non-finite close (${seed.close})`,
				RSI_NAME
			);
		}
		return new RsiInstance(this, seed.close);
	}
}

export class RsiInstance extends BaseIndicatorInstance<RsiConfig> {
	private readonly period: number;
	private readonly lower: number;
	private readonly upper: number;
	private previousClose: number;
	private avgGain = 0;
	private avgLoss = 0;
	private previousRsi = 50;

	constructor(config: RsiConfig, seedClose: number) {
		super(config);
		const { period, zone } = config.parameters();
		this.period = period;
		this.lower = zone;
		this.upper = 100 - zone;
		this.previousClose = seedClose;
	}

	next(candle: OHLCV): IndicatorResult {
		const change = candle.close - this.previousClose;
		this.previousClose = candle.close;
		const gain = Math.max(change, 0);
		const loss = Math.max(-change, 0);
		this.avgGain = (this.avgGain * (this.period - 1) + gain) / this.period;
		this.avgLoss = (this.avgLoss * (this.period - 1) + loss) / this.period;

		const rsi = this.compute();
		const signal = this.classify(this.previousRsi, rsi);
		this.previousRsi = rsi;
		return IndicatorResult.create([rsi], [signal]);
	}

	private compute(): number {
		const total = this.avgGain + this.avgLoss;
		if (total === 0) {
			return 50;
		}
		return (100 * this.avgGain) / total;
	}

	private classify(previous: number, current: number): Action {
		if (previous < this.lower && current >= this.lower) {
			return buy();
		}
		if (previous > this.upper && current <= this.upper) {
			return sell();
		}
		return NO_ACTION;
	}
}
