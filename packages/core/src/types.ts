/**
 * Read-only price/volume view every indicator consumes.
 * Anything exposing these five fields can seed and advance an indicator.
 */
export interface OHLCV {
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly volume: number;
}

export interface Candle extends OHLCV {
	symbol: string;
	timeframe: string;
	timestamp: number;
}

export const PRICE_SOURCES = [
	"open",
	"high",
	"low",
	"close",
	"hl2",
	"tp",
	"ohlc4",
] as const;

export type PriceSource = (typeof PRICE_SOURCES)[number];

export const hl2 = (candle: OHLCV): number => (candle.high + candle.low) / 2;

export const typicalPrice = (candle: OHLCV): number =>
	(candle.high + candle.low + candle.close) / 3;

export const ohlc4 = (candle: OHLCV): number =>
	(candle.open + candle.high + candle.low + candle.close) / 4;

export const isRising = (candle: OHLCV): boolean => candle.close > candle.open;

export const pickSource = (candle: OHLCV, source: PriceSource): number => {
	switch (source) {
		case "open":
			return candle.open;
		case "high":
			return candle.high;
		case "low":
			return candle.low;
		case "close":
			return candle.close;
		case "hl2":
			return hl2(candle);
		case "tp":
			return typicalPrice(candle);
		case "ohlc4":
			return ohlc4(candle);
	}
};

/**
 * Structural sanity check used by generators and seed checks.
 * Returns false on non-finite fields, inverted ranges, bodies outside the
 * range, or negative volume.
 */
export const validateCandle = (candle: OHLCV): boolean => {
	const { open, high, low, close, volume } = candle;
	if (![open, high, low, close, volume].every(Number.isFinite)) {
		return false;
	}
	if (high < low || volume < 0) {
		return false;
	}
	return open <= high && open >= low && close <= high && close >= low;
};
