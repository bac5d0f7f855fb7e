export type { Term, Token, FrequencyEntry, LineSink } from "./types.js";
export type { Tokenizer } from "./tokenizer.js";
export type { FrequencyTable } from "./frequencyTable.js";
export type { Emitter } from "./emitter.js";
export type { TextSource } from "./source.js";
export { byFrequency, type Ranking, type TopKSelector } from "./ranking.js";
export * from "./errors.js";
export * from "./impl/index.js";
