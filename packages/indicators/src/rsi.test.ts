import { describe, expect, it } from "vitest";
import { buy, candlesFromCloses, InvalidParameterError, NO_ACTION, sell } from "@indicore/core";
import { RsiConfig } from "./rsi";

describe("RSI", () => {
	it("smooths gains and losses and signals zone exits", () => {
		const results = new RsiConfig({ period: 2, zone: 30 }).over(
			candlesFromCloses([10, 8, 7, 9, 12, 10])
		);
		const rsi = results.map((r) => r.value(0));
		expect(rsi[0]).toBe(50);
		expect(rsi[1]).toBe(0);
		expect(rsi[2]).toBe(0);
		expect(rsi[3]).toBeCloseTo(200 / 3);
		expect(rsi[4]).toBeCloseTo(800 / 9);
		expect(rsi[5]).toBeCloseTo(100 / 2.125);
		expect(results.map((r) => r.signal(0))).toEqual([
			NO_ACTION,
			NO_ACTION,
			NO_ACTION,
			buy(),
			NO_ACTION,
			sell(),
		]);
	});

	it("stays neutral on a flat series", () => {
		const results = new RsiConfig().over(candlesFromCloses([5, 5, 5]));
		expect(results.map((r) => r.value(0))).toEqual([50, 50, 50]);
	});

	it("keeps period and zone inside their domains", () => {
		const config = new RsiConfig();
		expect(() => config.set("period", "1")).toThrow(InvalidParameterError);
		expect(() => config.set("zone", "50")).toThrow(InvalidParameterError);
		expect(() => config.set("zone", "")).toThrow(InvalidParameterError);
		config.set("zone", "20.5");
		expect(config.parameters()).toEqual({ period: 14, zone: 20.5 });
	});
});
