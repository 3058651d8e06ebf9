import {
	BaseIndicatorConfig,
	BaseIndicatorInstance,
	IncompatibleSeedError,
	IndicatorDomainError,
	IndicatorResult,
	actionFromSigned,
	integerParameter,
	numberParameter,
	type ParameterSchema,
	type ResultSize,
} from "..";
import type { OHLCV } from "../types";

export interface WindowSumParams {
	period: number;
	scale: number;
}

const WINDOW_SUM_SCHEMA: ParameterSchema<WindowSumParams> = {
	period: integerParameter(1),
	scale: numberParameter({ gt: 0 }),
};

/** Scaled sum of the last `period` closes; signal follows the candle body. */
export class WindowSumConfig extends BaseIndicatorConfig<WindowSumParams, WindowSumInstance> {
	protected readonly schema = WINDOW_SUM_SCHEMA;

	constructor(params: Partial<WindowSumParams> = {}) {
		super({ period: 3, scale: 1, ...params });
	}

	name(): string {
		return "WINDOW_SUM";
	}

	validate(): boolean {
		const { period, scale } = this.params;
		return Number.isInteger(period) && period >= 1 && scale > 0;
	}

	size(): ResultSize {
		return [1, 1];
	}

	clone(): WindowSumConfig {
		return new WindowSumConfig(this.params);
	}

	protected createInstance(seed: OHLCV): WindowSumInstance {
		if (seed.close < 0) {
			throw new IncompatibleSeedError("negative seed close", this.name());
		}
		if (seed.volume === 0) {
			throw new IndicatorDomainError("zero-volume seed", this.name());
		}
		return new WindowSumInstance(this);
	}
}

export class WindowSumInstance extends BaseIndicatorInstance<WindowSumConfig> {
	private readonly window: number[] = [];

	next(candle: OHLCV): IndicatorResult {
		const { period, scale } = this.cfg.parameters();
		this.window.push(candle.close);
		if (this.window.length > period) {
			this.window.shift();
		}
		const sum = this.window.reduce((acc, value) => acc + value, 0);
		return IndicatorResult.create([sum * scale], [actionFromSigned(candle.close - candle.open)]);
	}
}

export interface OffsetParams {
	offset: number;
}

const OFFSET_SCHEMA: ParameterSchema<OffsetParams> = {
	offset: numberParameter(),
};

/** Close plus a fixed offset. No signals. */
export class OffsetConfig extends BaseIndicatorConfig<OffsetParams, OffsetInstance> {
	protected readonly schema = OFFSET_SCHEMA;

	constructor(params: Partial<OffsetParams> = {}) {
		super({ offset: 0, ...params });
	}

	name(): string {
		return "OFFSET";
	}

	validate(): boolean {
		return Number.isFinite(this.params.offset);
	}

	size(): ResultSize {
		return [1, 0];
	}

	clone(): OffsetConfig {
		return new OffsetConfig(this.params);
	}

	protected createInstance(): OffsetInstance {
		return new OffsetInstance(this);
	}
}

export class OffsetInstance extends BaseIndicatorInstance<OffsetConfig> {
	next(candle: OHLCV): IndicatorResult {
		return IndicatorResult.create([candle.close + this.cfg.parameters().offset]);
	}
}
