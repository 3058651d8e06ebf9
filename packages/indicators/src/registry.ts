import {
	InvalidParameterError,
	toDyn,
	type Candle,
	type IndicatorConfigDyn,
	type OHLCV,
} from "@indicore/core";
import { ATR_NAME, AtrConfig } from "./atr";
import { EMA_NAME, EmaConfig } from "./ema";
import { MACD_NAME, MacdConfig } from "./macd";
import { RSI_NAME, RsiConfig } from "./rsi";
import { SMA_NAME, SmaConfig } from "./sma";

export interface IndicatorRegistryEntry {
	name: string;
	description: string;
	/** Fresh default configuration, erased. */
	create: <T extends OHLCV>() => IndicatorConfigDyn<T>;
}

export const indicatorRegistry: readonly IndicatorRegistryEntry[] = [
	{
		name: ATR_NAME,
		description: "Average true range",
		create: <T extends OHLCV>() => toDyn<AtrConfig, T>(new AtrConfig()),
	},
	{
		name: EMA_NAME,
		description: "Exponential moving average",
		create: <T extends OHLCV>() => toDyn<EmaConfig, T>(new EmaConfig()),
	},
	{
		name: MACD_NAME,
		description: "Moving average convergence/divergence",
		create: <T extends OHLCV>() => toDyn<MacdConfig, T>(new MacdConfig()),
	},
	{
		name: RSI_NAME,
		description: "Relative strength index",
		create: <T extends OHLCV>() => toDyn<RsiConfig, T>(new RsiConfig()),
	},
	{
		name: SMA_NAME,
		description: "Simple moving average",
		create: <T extends OHLCV>() => toDyn<SmaConfig, T>(new SmaConfig()),
	},
];

export function validateUniqueIndicatorNames(
	entries: readonly IndicatorRegistryEntry[]
): void {
	const seen = new Set<string>();
	for (const entry of entries) {
		const key = entry.name.toUpperCase();
		if (seen.has(key)) {
			throw new Error(
				`Duplicate indicator name detected: ${entry.name}. Indicator names must be unique.`
			);
		}
		seen.add(key);
	}
}

let registryMap: Map<string, IndicatorRegistryEntry> | null = null;

const getRegistryMap = (): Map<string, IndicatorRegistryEntry> => {
	if (!registryMap) {
		validateUniqueIndicatorNames(indicatorRegistry);
		registryMap = new Map(
			indicatorRegistry.map((entry) => [entry.name.toUpperCase(), entry])
		);
	}
	return registryMap;
};

export const listIndicatorNames = (): string[] =>
	indicatorRegistry.map((entry) => entry.name);

export const isRegisteredIndicator = (name: string): boolean =>
	getRegistryMap().has(name.trim().toUpperCase());

/**
 * Default configuration of the named indicator kind, case-insensitive.
 * @throws InvalidParameterError for an unknown name
 */
export const indicatorByName = <T extends OHLCV = Candle>(
	name: string
): IndicatorConfigDyn<T> => {
	const entry = getRegistryMap().get(name.trim().toUpperCase());
	if (!entry) {
		throw new InvalidParameterError(
			`Unknown indicator "${name}". Available indicators: ${listIndicatorNames().join(", ")}`,
			{ value: name }
		);
	}
	return entry.create<T>();
};
