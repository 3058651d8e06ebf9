export * from "./signals";
export * from "./sma";
export * from "./ema";
export * from "./rsi";
export * from "./atr";
export * from "./macd";
export * from "./registry";
export * from "./description";
export * from "./indicatorSet";
