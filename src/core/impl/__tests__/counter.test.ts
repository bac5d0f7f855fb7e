import { describe, expect, it } from "vitest";
import {
  InputReadError,
  LineEmitter,
  MemoryFrequencyTable,
  MinHeapTopKSelector,
  StringSource,
  WhitespaceTokenizer,
  WordFrequencyCounter,
  createWordFrequencyCounter,
  type FrequencyEntry,
  type FrequencyTable,
  type TextSource,
} from "../../index.js";

function asRecord(table: FrequencyTable): Record<string, number> {
  const out: Record<string, number> = {};
  for (const { term, count } of table.entries()) out[term] = count;
  return out;
}

function emitted(counter: WordFrequencyCounter, table: FrequencyTable, top?: number): string[] {
  const lines: string[] = [];
  counter.emit(table, (line) => lines.push(line), top === undefined ? undefined : { top });
  return lines;
}

// small deterministic LCG so generated inputs are stable across runs
function makeRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    return state / 4294967296;
  };
}

function randomText(rand: () => number): { text: string; tokens: string[] } {
  const words = ["a", "b", "Ab", "x.", "42", "é"];
  const gaps = [" ", "  ", "\t", "\n", "\r\n", " \f "];
  const tokens: string[] = [];
  let text = rand() < 0.5 ? "" : "\n";
  const n = Math.floor(rand() * 30);
  for (let i = 0; i < n; i++) {
    const w = words[Math.floor(rand() * words.length)] ?? "a";
    const g = gaps[Math.floor(rand() * gaps.length)] ?? " ";
    tokens.push(w);
    text += w + g;
  }
  return { text, tokens };
}

describe("WordFrequencyCounter", () => {
  it("counts occurrences per distinct token", () => {
    const counter = createWordFrequencyCounter();
    const table = counter.count("a b a c b a");
    expect(asRecord(table)).toEqual({ a: 3, b: 2, c: 1 });
    expect(table.total()).toBe(6);
  });

  it("counts a single token", () => {
    const counter = createWordFrequencyCounter();
    expect(asRecord(counter.count("one"))).toEqual({ one: 1 });
  });

  it("produces an empty table and no lines for blank input", () => {
    const counter = createWordFrequencyCounter();
    for (const text of ["", "   \n\t  "]) {
      const table = counter.count(text);
      expect(table.size()).toBe(0);
      expect(emitted(counter, table)).toEqual([]);
    }
  });

  it("emits one `token: count` line per distinct token", () => {
    const counter = createWordFrequencyCounter();
    const lines = emitted(counter, counter.count("a b a c b a"));
    expect([...lines].sort()).toEqual(["a: 3", "b: 2", "c: 1"]);
  });

  it("emits only the most frequent tokens when top is set", () => {
    const counter = createWordFrequencyCounter();
    const table = counter.count("a b a c b a");
    expect(emitted(counter, table, 2)).toEqual(["a: 3", "b: 2"]);
  });

  it("breaks count ties by token when top is set", () => {
    const counter = createWordFrequencyCounter();
    const table = counter.count("pear fig apple fig pear kiwi");
    expect(emitted(counter, table, 3)).toEqual(["fig: 2", "pear: 2", "apple: 1"]);
  });

  it("sums to the token count and lists each token once", () => {
    const counter = createWordFrequencyCounter();
    const rand = makeRandom(7);

    for (let run = 0; run < 50; run++) {
      const { text, tokens } = randomText(rand);
      const table = counter.count(text);

      expect(table.total()).toBe(tokens.length);

      const expected: Record<string, number> = {};
      for (const t of tokens) expected[t] = (expected[t] ?? 0) + 1;
      expect(asRecord(table)).toEqual(expected);

      const lines = emitted(counter, table);
      expect(new Set(lines).size).toBe(lines.length);
      expect(lines.length).toBe(Object.keys(expected).length);
    }
  });

  it("yields the same pairs when re-run on unchanged input", () => {
    const counter = createWordFrequencyCounter();
    const text = "to be or not to be";
    expect(asRecord(counter.count(text))).toEqual(asRecord(counter.count(text)));
  });

  it("reads sources in full before counting", () => {
    const counter = createWordFrequencyCounter();
    const table = counter.countSource(new StringSource("x y x"));
    expect(asRecord(table)).toEqual({ x: 2, y: 1 });
  });

  it("propagates read failures without emitting", () => {
    const counter = new WordFrequencyCounter({
      tokenizer: new WhitespaceTokenizer(),
      createTable: () => new MemoryFrequencyTable(),
      emitter: new LineEmitter(),
      topK: new MinHeapTopKSelector<FrequencyEntry>(),
    });
    const failing: TextSource = {
      name: "broken",
      read() {
        throw new InputReadError("broken", Object.assign(new Error("denied"), { code: "EACCES" }));
      },
    };

    const lines: string[] = [];
    expect(() => {
      const table = counter.countSource(failing);
      counter.emit(table, (line) => lines.push(line));
    }).toThrow('cannot read "broken" (EACCES)');
    expect(lines).toEqual([]);
  });
});
