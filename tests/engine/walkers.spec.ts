import * as fc from "fast-check";
import { describe, expect, it } from "vitest";

import { isDefaultEndChar } from "../../src/engine/end-chars.js";
import { AutomatonInvariantError } from "../../src/engine/errors.js";
import { ENGINE_KINDS, type EngineKind, type MatchEngine } from "../../src/engine/match-engine.js";
import { createMatchEngine } from "../../src/engine/state-manager.js";
import { buildTrieSet } from "../../src/engine/trie.js";
import { TrieWalker } from "../../src/engine/trie-walker.js";
import type { ExpansionRule } from "../../src/engine/types.js";
import { makeRule, outputOf } from "../helpers/rules.js";

function engineFor(
  kind: EngineKind,
  rules: ExpansionRule[],
  options: { foldCase?: boolean; historyDepth?: number } = {}
): MatchEngine {
  return createMatchEngine(rules, {
    kind,
    foldCase: options.foldCase ?? false,
    isEndChar: isDefaultEndChar,
    historyDepth: options.historyDepth ?? 32,
  });
}

/** Feeds `text` and returns the output of every rule that fired, in order. */
function feed(engine: MatchEngine, text: string): Array<string | null> {
  const fired: Array<string | null> = [];
  for (const char of text) {
    const rule = engine.followEdge(char.codePointAt(0) ?? 0);
    if (rule !== null) {
      fired.push(outputOf(rule));
    }
  }
  return fired;
}

describe.each(ENGINE_KINDS)("%s walker", (kind) => {
  it("fires a waiting rule only on the completion key", () => {
    const engine = engineFor(kind, [makeRule("btw", "by the way")]);
    expect(feed(engine, "btw")).toEqual([]);
    expect(feed(engine, " ")).toEqual(["by the way"]);
  });

  it("fires an immediate rule on its last character", () => {
    const engine = engineFor(kind, [makeRule("ab", "x", { waitForCompletionKey: false })]);
    expect(feed(engine, "ab")).toEqual(["x"]);
  });

  it("matches word-boundary rules only at the start of a word", () => {
    const engine = engineFor(kind, [makeRule("yd", "yard")]);
    expect(feed(engine, "yd xyd -yd ")).toEqual(["yard", "yard"]);
  });

  it("matches internal rules anywhere", () => {
    const engine = engineFor(kind, [makeRule("yd", "yard", { internal: true })]);
    expect(feed(engine, "xyd 5yd ")).toEqual(["yard", "yard"]);
  });

  it("restarts at the word boundary after a completion", () => {
    const engine = engineFor(kind, [makeRule("a", "1")]);
    expect(feed(engine, "a a ")).toEqual(["1", "1"]);
    expect(engine.snapshot().pendingCompletion).toBe(true);
  });

  it("follows an end-character edge before completing a shorter rule", () => {
    const engine = engineFor(kind, [makeRule("i", "I"), makeRule("i.e.", "that is")]);
    expect(feed(engine, "i.e.")).toEqual([]);
    expect(engine.snapshot().pendingCompletion).toBe(false);
    expect(feed(engine, " ")).toEqual(["that is"]);
    expect(feed(engine, "i ")).toEqual(["I"]);
  });

  it("folds case when asked", () => {
    const rules = [makeRule("btw", "by the way")];
    expect(feed(engineFor(kind, rules, { foldCase: true }), "BtW ")).toEqual(["by the way"]);
    expect(feed(engineFor(kind, rules), "BtW ")).toEqual([]);
  });

  it("prefers the longer match that ends at the same character", () => {
    const immediate = { internal: true, waitForCompletionKey: false };
    const engine = engineFor(kind, [
      makeRule("he", "short", immediate),
      makeRule("she", "long", immediate),
    ]);
    expect(feed(engine, "she")).toEqual(["long"]);
    expect(feed(engine, " he")).toEqual(["short"]);
  });

  it("undoes steps with rewind", () => {
    const engine = engineFor(kind, [makeRule("btw", "by the way")]);
    feed(engine, "btx");
    engine.rewind();
    expect(feed(engine, "w ")).toEqual(["by the way"]);
  });

  it("ignores rewind on an empty history", () => {
    const engine = engineFor(kind, [makeRule("ab", "x")]);
    const initial = engine.snapshot();
    engine.rewind();
    expect(engine.snapshot()).toEqual(initial);
  });

  it("returns to the start state when rewinding past the history", () => {
    const engine = engineFor(kind, [makeRule("ab", "x")], { historyDepth: 2 });
    const initial = engine.snapshot();
    feed(engine, "xyz");
    engine.rewind();
    engine.rewind();
    engine.rewind();
    expect(engine.snapshot().state).toBe(initial.state);
    expect(engine.snapshot().history).toEqual([]);
  });

  it("forgets everything on reset", () => {
    const engine = engineFor(kind, [makeRule("ab", "x")]);
    const initial = engine.snapshot();
    feed(engine, "zzab");
    engine.reset();
    expect(engine.snapshot()).toEqual(initial);
  });

  it("restores the exact snapshot after followEdge then rewind", () => {
    const rules = [
      makeRule("ab", "1"),
      makeRule("b-", "2", { internal: true, waitForCompletionKey: false }),
      makeRule("a", "3", { internal: true }),
    ];
    fc.assert(
      fc.property(
        fc.array(fc.constantFrom("a", "b", "-", " "), { maxLength: 30 }),
        fc.constantFrom("a", "b", "-", " "),
        (prefix, next) => {
          const engine = engineFor(kind, rules, { historyDepth: 64 });
          feed(engine, prefix.join(""));
          const before = engine.snapshot();
          feed(engine, next);
          engine.rewind();
          expect(engine.snapshot()).toEqual(before);
        }
      )
    );
  });
});

describe("TrieWalker", () => {
  it("refuses an undecorated trie", () => {
    const trie = buildTrieSet([], { foldCase: false });
    expect(
      () => new TrieWalker(trie, { foldCase: false, isEndChar: isDefaultEndChar, historyDepth: 4 })
    ).toThrow(AutomatonInvariantError);
  });
});

describe("engine equivalence", () => {
  const ruleArbitrary = fc.record({
    abbreviation: fc.stringOf(fc.constantFrom("a", "b", "-"), { minLength: 1, maxLength: 4 }),
    internal: fc.boolean(),
    waitForCompletionKey: fc.boolean(),
    priority: fc.integer({ min: 0, max: 1 }),
  });

  it("fires the same rules on the same input", () => {
    fc.assert(
      fc.property(
        fc.array(ruleArbitrary, { minLength: 1, maxLength: 6 }),
        fc.stringOf(fc.constantFrom("a", "b", "-", " "), { maxLength: 24 }),
        (specs, input) => {
          const rules = specs.map((spec, id) =>
            makeRule(spec.abbreviation, `rule${id}`, {
              id,
              internal: spec.internal,
              waitForCompletionKey: spec.waitForCompletionKey,
              priority: spec.priority,
            })
          );
          const automaton = feed(engineFor("automaton", rules), input);
          const trie = feed(engineFor("trie", rules), input);
          expect(trie).toEqual(automaton);
        }
      )
    );
  });
});
