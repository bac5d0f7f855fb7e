export { WhitespaceTokenizer } from "./whitespaceTokenizer.js";
export { MemoryFrequencyTable } from "./memoryFrequencyTable.js";
export { LineEmitter, formatEntry, DEFAULT_SEPARATOR } from "./lineEmitter.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
export { FileSource } from "./fileSource.js";
export { StringSource } from "./stringSource.js";
export {
  WordFrequencyCounter,
  createWordFrequencyCounter,
  type CounterDeps,
  type EmitOptions,
} from "./wordFrequencyCounter.js";
