import type { Candle } from "../types";

/** Flat-bodied candle one unit either side of `close`. */
export const makeCandle = (close: number, overrides: Partial<Candle> = {}): Candle => ({
	symbol: "TEST/USD",
	timeframe: "1m",
	timestamp: 0,
	open: close,
	high: close + 1,
	low: close - 1,
	close,
	volume: 100,
	...overrides,
});

/** One-minute series built with `makeCandle`, timestamps starting at 0. */
export const candlesFromCloses = (closes: readonly number[]): Candle[] =>
	closes.map((close, index) => makeCandle(close, { timestamp: index * 60_000 }));
