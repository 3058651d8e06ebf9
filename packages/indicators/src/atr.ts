import {
	BaseIndicatorConfig,
	BaseIndicatorInstance,
	IncompatibleSeedError,
	IndicatorResult,
	isValidPeriod,
	periodParameter,
	validateCandle,
	type OHLCV,
	type ParameterSchema,
	type ResultSize,
} from "@indicore/core";

export const ATR_NAME = "ATR";

export interface AtrParams {
	period: number;
}

const ATR_SCHEMA: ParameterSchema<AtrParams> = {
	period: periodParameter(),
};

export const trueRange = (candle: OHLCV, previousClose: number): number =>
	Math.max(
		candle.high - candle.low,
		Math.abs(candle.high - previousClose),
		Math.abs(candle.low - previousClose)
	);

/** Wilder-smoothed average true range. No signals. */
export class AtrConfig extends BaseIndicatorConfig<AtrParams, AtrInstance> {
	protected readonly schema = ATR_SCHEMA;

	constructor(params: Partial<AtrParams> = {}) {
		super({ period: 14, ...params });
	}

	name(): string {
		return ATR_NAME;
	}

	validate(): boolean {
		return isValidPeriod(this.params.period);
	}

	size(): ResultSize {
		return [1, 0];
	}

	clone(): AtrConfig {
		return new AtrConfig(this.params);
	}

	protected createInstance(seed: OHLCV): AtrInstance {
		if (!validateCandle(seed)) {
			throw new IncompatibleSeedError(
				`ATR needs a well-formed seed candle (high=${seed.high}, low=${seed.low}, close=${seed.close})`,
				ATR_NAME
			);
		}
		return new AtrInstance(this, seed);
	}
}

export class AtrInstance extends BaseIndicatorInstance<AtrConfig> {
	private readonly period: number;
	private previousClose: number;
	private atr: number;

	constructor(config: AtrConfig, seed: OHLCV) {
		super(config);
		this.period = config.parameters().period;
		this.previousClose = seed.close;
		this.atr = seed.high - seed.low;
	}

	next(candle: OHLCV): IndicatorResult {
		const range = trueRange(candle, this.previousClose);
		this.previousClose = candle.close;
		this.atr = (this.atr * (this.period - 1) + range) / this.period;
		return IndicatorResult.create([this.atr]);
	}
}
