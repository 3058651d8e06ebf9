import {
	InvalidParameterError,
	type Candle,
	type IndicatorConfigDyn,
	type OHLCV,
} from "@indicore/core";
import { indicatorByName } from "./registry";

export interface IndicatorDescription {
	name: string;
	params: Array<[name: string, value: string]>;
}

const DESCRIPTION_PATTERN = /^\s*([A-Za-z][\w-]*)\s*(?:\(([^()]*)\))?\s*$/;

/**
 * Splits `NAME(key=value, ...)` into its parts. Parentheses are optional
 * when there are no parameters.
 */
export const parseDescriptionText = (text: string): IndicatorDescription => {
	const match = DESCRIPTION_PATTERN.exec(text);
	if (!match) {
		throw new InvalidParameterError(
			`Malformed indicator description: "${text}". Expected NAME(key=value, ...)`,
			{ value: text }
		);
	}
	const [, name, body = ""] = match;
	const params: Array<[string, string]> = [];
	for (const part of body.split(",")) {
		const trimmed = part.trim();
		if (!trimmed) {
			continue;
		}
		const eq = trimmed.indexOf("=");
		const key = eq > 0 ? trimmed.slice(0, eq).trim() : "";
		if (!key) {
			throw new InvalidParameterError(
				`Malformed parameter "${trimmed}" in "${text}". Expected key=value`,
				{ indicator: name, value: trimmed }
			);
		}
		params.push([key, trimmed.slice(eq + 1).trim()]);
	}
	return { name, params };
};

/**
 * Builds a configured, validated indicator from text such as
 * `SMA(period=3, source=hl2)`.
 */
export const parseIndicatorDescription = <T extends OHLCV = Candle>(
	text: string
): IndicatorConfigDyn<T> => {
	const { name, params } = parseDescriptionText(text);
	return configureIndicator<T>(name, params);
};

export const configureIndicator = <T extends OHLCV = Candle>(
	name: string,
	params: ReadonlyArray<readonly [string, string]>
): IndicatorConfigDyn<T> => {
	const config = indicatorByName<T>(name);
	for (const [key, value] of params) {
		config.set(key, value);
	}
	if (!config.validate()) {
		throw new InvalidParameterError(
			`${config.name()} rejects the combination ${params
				.map(([key, value]) => `${key}=${value}`)
				.join(", ")}`,
			{ indicator: config.name() }
		);
	}
	return config;
};
