import type { Candle, OHLCV } from "../types";
import { createLogger } from "../utils/logger";
import type { Cloneable, IndicatorConfig } from "./config";
import type { IndicatorInstance } from "./instance";
import type { IndicatorResult, ResultSize } from "./result";

const logger = createLogger("indicator-dyn");

/**
 * Type-erased instance: only the candle type is visible to the holder.
 */
export interface IndicatorInstanceDyn<T extends OHLCV = Candle> {
	next(candle: T): IndicatorResult;
	over(inputs: readonly T[]): IndicatorResult[];
	size(): ResultSize;
	name(): string;
}

/**
 * Type-erased configuration, so hosts can keep indicators of different kinds
 * in one collection.
 *
 * Unlike the static `init`/`over`, these borrow the configuration: each call
 * clones it first and the caller's object never changes or gets aliased.
 */
export interface IndicatorConfigDyn<T extends OHLCV = Candle> {
	init(seed: T): IndicatorInstanceDyn<T>;
	over(inputs: readonly T[]): IndicatorResult[];
	name(): string;
	validate(): boolean;
	set(name: string, value: string): void;
	size(): ResultSize;
}

/** Any static configuration that can be duplicated qualifies for erasure. */
export type ErasableConfig<C> = IndicatorConfig<IndicatorInstance> & Cloneable<C>;

export class DynIndicatorInstance<T extends OHLCV, I extends IndicatorInstance>
	implements IndicatorInstanceDyn<T>
{
	constructor(private readonly instance: I) {}

	next(candle: T): IndicatorResult {
		return this.instance.next(candle);
	}

	over(inputs: readonly T[]): IndicatorResult[] {
		return this.instance.over(inputs);
	}

	size(): ResultSize {
		return this.instance.size();
	}

	name(): string {
		return this.instance.name();
	}

	unwrap(): I {
		return this.instance;
	}
}

export class DynIndicatorConfig<T extends OHLCV, C extends ErasableConfig<C>>
	implements IndicatorConfigDyn<T>
{
	constructor(private readonly config: C) {}

	init(seed: T): IndicatorInstanceDyn<T> {
		const instance = this.config.clone().init(seed);
		logger.debug("indicator_init", {
			indicator: this.config.name(),
			size: this.config.size(),
		});
		return new DynIndicatorInstance<T, IndicatorInstance>(instance);
	}

	over(inputs: readonly T[]): IndicatorResult[] {
		return this.config.clone().over(inputs);
	}

	name(): string {
		return this.config.name();
	}

	validate(): boolean {
		return this.config.validate();
	}

	set(name: string, value: string): void {
		try {
			this.config.set(name, value);
		} catch (error) {
			logger.warn("indicator_set_rejected", {
				indicator: this.config.name(),
				parameter: name,
				value,
				error,
			});
			throw error;
		}
	}

	size(): ResultSize {
		return this.config.size();
	}

	/** Copy of the wrapped configuration; changes go through `set`. */
	inner(): C {
		return this.config.clone();
	}
}

/**
 * Erases the concrete type of any cloneable configuration. This is the only
 * bridge between the static and dynamic layers; indicators never write their
 * own adapters.
 */
export const toDyn = <C extends ErasableConfig<C>, T extends OHLCV = Candle>(
	config: C
): DynIndicatorConfig<T, C> => new DynIndicatorConfig<T, C>(config);
