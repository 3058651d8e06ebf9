import { describe, expect, it, vi } from "vitest";
import {
	IncompatibleSeedError,
	IndicatorDomainError,
	InvalidParameterError,
	isIndicatorError,
} from "../errors";
import { candlesFromCloses, makeCandle } from "../helpers/candles";
import { WindowSumConfig } from "../__tests__/fixtures";

const values = (config: WindowSumConfig, closes: number[]): number[] =>
	config.over(candlesFromCloses(closes)).map((result) => result.value(0));

describe("BaseIndicatorConfig", () => {
	describe("set()", () => {
		it("parses and applies a known parameter", () => {
			const config = new WindowSumConfig();
			config.set("period", " 5 ");
			config.set("scale", "1.5");
			expect(config.parameters()).toEqual({ period: 5, scale: 1.5 });
		});

		it("rejects unknown parameter names", () => {
			const config = new WindowSumConfig();
			let caught: unknown;
			try {
				config.set("length", "3");
			} catch (error) {
				caught = error;
			}
			expect(caught).toBeInstanceOf(InvalidParameterError);
			expect(isIndicatorError(caught) && caught.kind).toBe("InvalidParameter");
			expect(caught).toMatchObject({ parameter: "length", value: "3", indicator: "WINDOW_SUM" });
		});

		it("leaves the configuration untouched when a value is rejected", () => {
			const config = new WindowSumConfig();
			for (const [name, value] of [
				["period", "0"],
				["period", "abc"],
				["period", "2.5"],
				["period", ""],
				["scale", "0"],
				["scale", "NaN"],
			]) {
				expect(() => config.set(name, value)).toThrow(InvalidParameterError);
			}
			expect(config.parameters()).toEqual({ period: 3, scale: 1 });
		});

		it("does not treat inherited object keys as parameters", () => {
			const config = new WindowSumConfig();
			expect(() => config.set("toString", "1")).toThrow(/has no parameter "toString"/);
		});

		it("lists settable parameters", () => {
			expect(new WindowSumConfig().parameterNames()).toEqual(["period", "scale"]);
		});
	});

	describe("validate()", () => {
		it("is stable across repeated calls", () => {
			const valid = new WindowSumConfig();
			const invalid = new WindowSumConfig({ period: 0 });
			expect([valid.validate(), valid.validate()]).toEqual([true, true]);
			expect([invalid.validate(), invalid.validate()]).toEqual([false, false]);
		});
	});

	describe("init()", () => {
		it("refuses parameters validate() rejects, for any seed", () => {
			const config = new WindowSumConfig({ period: 0 });
			for (const seed of [makeCandle(1), makeCandle(-5), makeCandle(3, { volume: 0 })]) {
				expect(() => config.init(seed)).toThrow(InvalidParameterError);
			}
		});

		it("reports seeds the parameters cannot start from", () => {
			expect(() => new WindowSumConfig().init(makeCandle(-1))).toThrow(IncompatibleSeedError);
		});

		it("passes indicator-specific errors through", () => {
			expect(() => new WindowSumConfig().init(makeCandle(1, { volume: 0 }))).toThrow(
				IndicatorDomainError
			);
		});

		it("reflects values applied with set()", () => {
			const config = new WindowSumConfig();
			config.set("period", "2");
			expect(config.validate()).toBe(true);
			const instance = config.init(makeCandle(1));
			expect(instance.config().parameters().period).toBe(2);
			expect(instance.over(candlesFromCloses([1, 2, 3, 4])).map((r) => r.value(0))).toEqual([
				1, 3, 5, 7,
			]);
		});
	});

	describe("over()", () => {
		it("returns an empty list without calling init", () => {
			const config = new WindowSumConfig();
			const initSpy = vi.spyOn(config, "init");
			expect(config.over([])).toEqual([]);
			expect(initSpy).not.toHaveBeenCalled();
		});

		it("seeds with the first candle and evaluates every candle", () => {
			const config = new WindowSumConfig();
			const initSpy = vi.spyOn(config, "init");
			const candles = candlesFromCloses([1, 2, 3, 4]);
			const results = config.over(candles);
			expect(initSpy).toHaveBeenCalledTimes(1);
			expect(initSpy).toHaveBeenCalledWith(candles[0]);
			expect(results).toHaveLength(4);
			expect(results.map((r) => r.value(0))).toEqual([1, 3, 6, 9]);
		});

		it("matches calling next() over the same sequence", () => {
			const candles = candlesFromCloses([5, 3, 8, 1, 9, 2]);
			const batch = new WindowSumConfig({ period: 2 }).over(candles);
			const instance = new WindowSumConfig({ period: 2 }).init(candles[0]);
			const stepped = candles.map((candle) => instance.next(candle));
			expect(batch).toEqual(stepped);
		});

		it("applies every parameter", () => {
			expect(values(new WindowSumConfig({ scale: 2 }), [1, 2, 3, 4])).toEqual([2, 6, 12, 18]);
		});

		it("propagates init failures without partial results", () => {
			expect(() => new WindowSumConfig({ period: 0 }).over(candlesFromCloses([1, 2]))).toThrow(
				InvalidParameterError
			);
			expect(() => new WindowSumConfig().over(candlesFromCloses([-1, 2]))).toThrow(
				IncompatibleSeedError
			);
		});

		it("emits results with the declared arity", () => {
			const config = new WindowSumConfig();
			for (const result of config.over(candlesFromCloses([1, 2, 3]))) {
				expect(result.size()).toEqual(config.size());
			}
		});
	});

	it("transfers itself into the instance it builds", () => {
		const config = new WindowSumConfig();
		const instance = config.init(makeCandle(1));
		expect(instance.config()).toBe(config);
		expect(instance.name()).toBe("WINDOW_SUM");
		expect(instance.size()).toEqual([1, 1]);
	});
});
