import type { Candle } from "../types";

export interface RandomCandlesOptions {
	seed?: number;
	symbol?: string;
	timeframe?: string;
	startTimestamp?: number;
	intervalMs?: number;
	startPrice?: number;
	/** Max relative move of one candle body, e.g. 0.02 for 2%. */
	volatility?: number;
}

const DEFAULTS: Required<RandomCandlesOptions> = {
	seed: 42,
	symbol: "TEST/USD",
	timeframe: "1m",
	startTimestamp: 0,
	intervalMs: 60_000,
	startPrice: 100,
	volatility: 0.02,
};

/**
 * Deterministic candle stream for tests and examples. The same options always
 * produce the same sequence; every candle passes `validateCandle`.
 */
export class RandomCandles implements Iterable<Candle> {
	private readonly options: Required<RandomCandlesOptions>;
	private state: number;
	private price: number;
	private timestamp: number;

	constructor(options: RandomCandlesOptions = {}) {
		this.options = { ...DEFAULTS, ...options };
		if (!(this.options.volatility > 0 && this.options.volatility < 1)) {
			throw new RangeError(`volatility must be within (0, 1), got ${this.options.volatility}`);
		}
		if (!(this.options.startPrice > 0)) {
			throw new RangeError(`startPrice must be positive, got ${this.options.startPrice}`);
		}
		this.state = this.options.seed >>> 0;
		this.price = this.options.startPrice;
		this.timestamp = this.options.startTimestamp;
	}

	next(): Candle {
		const { volatility } = this.options;
		const open = this.price;
		const close = open * (1 + (this.random() * 2 - 1) * volatility);
		const high = Math.max(open, close) * (1 + this.random() * volatility * 0.5);
		const low = Math.min(open, close) * (1 - this.random() * volatility * 0.5);
		const volume = 100 + this.random() * 900;

		const candle: Candle = {
			symbol: this.options.symbol,
			timeframe: this.options.timeframe,
			timestamp: this.timestamp,
			open,
			high,
			low,
			close,
			volume,
		};
		this.price = close;
		this.timestamp += this.options.intervalMs;
		return candle;
	}

	take(count: number): Candle[] {
		const candles: Candle[] = [];
		for (let i = 0; i < count; i += 1) {
			candles.push(this.next());
		}
		return candles;
	}

	*[Symbol.iterator](): Iterator<Candle> {
		while (true) {
			yield this.next();
		}
	}

	// mulberry32
	private random(): number {
		this.state = (this.state + 0x6d2b79f5) >>> 0;
		let t = this.state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	}
}
