export { RollingBuffer } from "./RollingBuffer";
export type { IndicatorState } from "./types";
export { SmaState } from "./sma";
export { EmaState } from "./ema";
export { RsiState, rsiFromAverages } from "./rsi";
export { RollingStdDevState } from "./stdev";
export type { RollingStdDevOptions } from "./stdev";
export { MacdState } from "./macd";
export type { MacdOptions, MacdResult } from "./macd";
export { BollingerState } from "./bollinger";
export type { BollingerBands, BollingerOptions } from "./bollinger";
export { createIndicator } from "./registry";
export type { CreateIndicatorOptions } from "./registry";
export { replayInto } from "./utils/replay";
