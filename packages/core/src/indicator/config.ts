import { InvalidParameterError } from "../errors";
import type { OHLCV } from "../types";
import type { IndicatorInstance } from "./instance";
import { describeIssues, type ParameterSchema } from "./parameters";
import type { IndicatorResult, ResultSize } from "./result";

/**
 * Static capability of an indicator's parameter object.
 *
 * A configuration is tuned with `set`, checked with `validate`, and then
 * consumed by `init`: the returned instance owns it from that point on.
 */
export interface IndicatorConfig<TInstance extends IndicatorInstance = IndicatorInstance> {
	name(): string;

	/** Pure; false for any parameters `init` must not accept. */
	validate(): boolean;

	/**
	 * Sets one parameter from its string form.
	 * @throws InvalidParameterError on an unknown name or a rejected value; the
	 * configuration is left untouched.
	 */
	set(name: string, value: string): void;

	/** `[raw value count, signal count]` of every result this indicator emits. */
	size(): ResultSize;

	/**
	 * @throws InvalidParameterError when `validate()` is false
	 * @throws IncompatibleSeedError when `seed` cannot start the indicator
	 */
	init(seed: OHLCV): TInstance;

	/**
	 * Seeds with `inputs[0]` and evaluates the whole sequence, first candle
	 * included. An empty sequence yields `[]` without calling `init`.
	 */
	over(inputs: readonly OHLCV[]): IndicatorResult[];
}

export interface Cloneable<TSelf> {
	clone(): TSelf;
}

/**
 * Shared plumbing for concrete configurations: string-keyed `set` over a
 * parameter schema, the `init` validation gate and the batch `over`.
 */
export abstract class BaseIndicatorConfig<
	TParams extends object,
	TInstance extends IndicatorInstance,
> implements IndicatorConfig<TInstance>
{
	protected params: TParams;
	protected abstract readonly schema: ParameterSchema<TParams>;

	constructor(params: TParams) {
		this.params = { ...params };
	}

	abstract name(): string;
	abstract validate(): boolean;
	abstract size(): ResultSize;
	abstract clone(): BaseIndicatorConfig<TParams, TInstance>;

	/** Builds the state once parameters are known to be valid. */
	protected abstract createInstance(seed: OHLCV): TInstance;

	parameters(): Readonly<TParams> {
		return { ...this.params };
	}

	parameterNames(): string[] {
		return Object.keys(this.schema);
	}

	set(name: string, value: string): void {
		if (!this.isParameterName(name)) {
			throw new InvalidParameterError(
				`${this.name()} has no parameter "${name}"`,
				{ indicator: this.name(), parameter: name, value }
			);
		}
		this.assign(name, value);
	}

	init(seed: OHLCV): TInstance {
		if (!this.validate()) {
			throw new InvalidParameterError(
				`${this.name()} configuration is invalid: ${JSON.stringify(this.params)}`,
				{ indicator: this.name() }
			);
		}
		return this.createInstance(seed);
	}

	over(inputs: readonly OHLCV[]): IndicatorResult[] {
		if (inputs.length === 0) {
			return [];
		}
		const instance = this.init(inputs[0]);
		return instance.over(inputs);
	}

	private isParameterName(name: string): name is Extract<keyof TParams, string> {
		return Object.prototype.hasOwnProperty.call(this.schema, name);
	}

	private assign<K extends Extract<keyof TParams, string>>(key: K, raw: string): void {
		const schema = this.schema[key];
		if (!schema) {
			throw new InvalidParameterError(`${this.name()} has no parameter "${key}"`, {
				indicator: this.name(),
				parameter: key,
				value: raw,
			});
		}
		const parsed = schema.safeParse(raw);
		if (!parsed.success) {
			throw new InvalidParameterError(
				`Invalid value "${raw}" for ${this.name()}.${key}: ${describeIssues(parsed.error)}`,
				{ indicator: this.name(), parameter: key, value: raw }
			);
		}
		const next = { ...this.params };
		next[key] = parsed.data;
		this.params = next;
	}
}
