import {
	BaseIndicatorConfig,
	BaseIndicatorInstance,
	IncompatibleSeedError,
	IndicatorResult,
	isValidPeriod,
	periodParameter,
	type OHLCV,
	type ParameterSchema,
	type ResultSize,
} from "@indicore/core";
import { emaAlpha } from "./ema";
import { zeroCross } from "./signals";

export const MACD_NAME = "MACD";

export interface MacdParams {
	fast: number;
	slow: number;
	signal: number;
}

const MACD_SCHEMA: ParameterSchema<MacdParams> = {
	fast: periodParameter(),
	slow: periodParameter(),
	signal: periodParameter(),
};

/**
 * Moving average convergence/divergence on closes.
 * Raw: macd line, signal line, histogram. Signal: histogram crossing zero.
 *
 * `fast < slow` is a cross-field rule, so `set` accepts either order and
 * `validate` (and therefore `init`) rejects it.
 */
export class MacdConfig extends BaseIndicatorConfig<MacdParams, MacdInstance> {
	protected readonly schema = MACD_SCHEMA;

	constructor(params: Partial<MacdParams> = {}) {
		super({ fast: 12, slow: 26, signal: 9, ...params });
	}

	name(): string {
		return MACD_NAME;
	}

	validate(): boolean {
		const { fast, slow, signal } = this.params;
		return (
			[fast, slow, signal].every((period) => isValidPeriod(period)) &&
			fast < slow
		);
	}

	size(): ResultSize {
		return [3, 1];
	}

	clone(): MacdConfig {
		return new MacdConfig(this.params);
	}

	protected createInstance(seed: OHLCV): MacdInstance {
		if (!Number.isFinite(seed.close)) {
			throw new IncompatibleSeedError(
				`MACD cannot start from a non-finite close (${seed.close})`,
				MACD_NAME
			);
		}
		return new MacdInstance(this, seed.close);
	}
}

export class MacdInstance extends BaseIndicatorInstance<MacdConfig> {
	private readonly fastAlpha: number;
	private readonly slowAlpha: number;
	private readonly signalAlpha: number;
	private fastEma: number;
	private slowEma: number;
	private signalEma = 0;
	private previousHistogram = 0;

	constructor(config: MacdConfig, seedClose: number) {
		super(config);
		const { fast, slow, signal } = config.parameters();
		this.fastAlpha = emaAlpha(fast);
		this.slowAlpha = emaAlpha(slow);
		this.signalAlpha = emaAlpha(signal);
		this.fastEma = seedClose;
		this.slowEma = seedClose;
	}

	next(candle: OHLCV): IndicatorResult {
		this.fastEma += this.fastAlpha * (candle.close - this.fastEma);
		this.slowEma += this.slowAlpha * (candle.close - this.slowEma);
		const macd = this.fastEma - this.slowEma;
		this.signalEma += this.signalAlpha * (macd - this.signalEma);
		const histogram = macd - this.signalEma;

		const action = zeroCross(this.previousHistogram, histogram);
		this.previousHistogram = histogram;
		return IndicatorResult.create([macd, this.signalEma, histogram], [action]);
	}
}
