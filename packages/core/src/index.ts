/**
 * Shared contracts of the indicator framework: candle capability, result
 * payload, error taxonomy, the static configuration/instance capabilities and
 * the type-erased adapter layer over them.
 */
export * from "./types";
export * from "./errors";
export * from "./indicator/result";
export * from "./indicator/parameters";
export * from "./indicator/instance";
export * from "./indicator/config";
export * from "./indicator/dyn";
export * from "./helpers/candles";
export * from "./helpers/randomCandles";
export * from "./utils/logger";
export * from "./env";
export * from "./config";
