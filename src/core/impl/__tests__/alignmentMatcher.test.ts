import { describe, expect, it } from "vitest";
import { AlignmentMatcher, DEFAULT_SCORE_MODEL, createScoreModel, type MatchOutcome } from "../../index.js";

// Scores every alignment of an ASCII query in an ASCII key and keeps the best.
function bestAlignment(query: string, key: string): MatchOutcome {
  const w = DEFAULT_SCORE_MODEL;
  const q = query.toLowerCase();
  const k = key.toLowerCase();

  const score = (picked: number[]): number => {
    const first = picked[0] ?? 0;
    let s = (key.length - query.length) * w.unmatchedLetterPenalty;
    s += first === 0 ? 0 : Math.max(w.leadingLetterPenalty * first, w.maxLeadingLetterPenalty);
    picked.forEach((p, n) => {
      if (n > 0 && p === (picked[n - 1] ?? -2) + 1) s += w.adjacencyBonus;
      if (p === 0) return;
      const prev = key[p - 1] ?? "";
      const cur = key[p] ?? "";
      if (!/[\p{L}\p{N}]/u.test(prev)) s += w.separatorBonus;
      if (/[a-z]/.test(prev) && /[A-Z]/.test(cur)) s += w.camelBonus;
    });
    return s;
  };

  let best = -Infinity;
  const visit = (i: number, from: number, picked: number[]): void => {
    if (i === q.length) {
      best = Math.max(best, score(picked));
      return;
    }
    for (let j = from; j < k.length; j++) if (k[j] === q[i]) visit(i + 1, j + 1, [...picked, j]);
  };
  visit(0, 0, []);

  return best === -Infinity ? { matched: false, score: 0 } : { matched: true, score: best };
}

describe("AlignmentMatcher", () => {
  const matcher = new AlignmentMatcher();

  it("matches everything with score 0 for an empty query", () => {
    expect(matcher.evaluate("", "foo")).toEqual({ matched: true, score: 0 });
    expect(matcher.evaluate("", "")).toEqual({ matched: true, score: 0 });
  });

  it("rejects empty keys, short keys and missing subsequences", () => {
    expect(matcher.evaluate("a", "")).toEqual({ matched: false, score: 0 });
    expect(matcher.evaluate("abc", "ab")).toEqual({ matched: false, score: 0 });
    expect(matcher.evaluate("ab", "xyz")).toEqual({ matched: false, score: 0 });
    // characters present but out of order
    expect(matcher.evaluate("ba", "ab")).toEqual({ matched: false, score: 0 });
  });

  it("compares case-insensitively", () => {
    expect(matcher.evaluate("AB", "ab")).toEqual({ matched: true, score: 5 });
    expect(matcher.evaluate("ab", "AB")).toEqual({ matched: true, score: 5 });
  });

  it("folds case one code point at a time", () => {
    // "İ" lowercases to "i" plus a combining dot
    expect(matcher.evaluate("i", "İstanbul")).toEqual({ matched: true, score: -7 });
    expect(matcher.evaluate("istanbul", "İSTANBUL")).toEqual({ matched: true, score: 35 });
    // Deseret letters sit outside the BMP
    expect(matcher.evaluate("\u{10428}", "\u{10400}")).toEqual({ matched: true, score: 0 });
    expect(matcher.evaluate("é", "É")).toEqual({ matched: true, score: 0 });
  });

  it("counts positions in code points for penalties and bonuses", () => {
    // lead -6, separator +10, two unmatched -2
    expect(matcher.evaluate("\u{10428}", "x-\u{10400}")).toEqual({ matched: true, score: 2 });
    // adjacency +5, camel +10
    expect(matcher.evaluate("a\u{10428}", "a\u{10400}")).toEqual({ matched: true, score: 15 });
  });

  it("prefers the alignment that earns adjacency over the first occurrence", () => {
    // a@1 b@2: lead -3, adjacency +5, one unmatched -1
    // a@0 b@2 would score -1
    expect(matcher.evaluate("ab", "aab")).toEqual({ matched: true, score: 1 });
  });

  it("scores the separator example above plain adjacency", () => {
    const aab = matcher.evaluate("ab", "aab");
    const sep = matcher.evaluate("ab", "a-b");
    expect(sep).toEqual({ matched: true, score: 9 });
    expect(sep.score).toBeGreaterThan(aab.score);
  });

  it("rewards a separator right before the first matched character", () => {
    expect(matcher.evaluate("ab", "xab").score).toBe(1);
    expect(matcher.evaluate("ab", "x-ab").score).toBe(7);
    expect(matcher.evaluate("b", "a b").score).toBe(2);
  });

  it("does not treat digits as separators", () => {
    expect(matcher.evaluate("b", "1b")).toEqual({ matched: true, score: -4 });
  });

  it("rewards camel-case boundaries", () => {
    expect(matcher.evaluate("fb", "fooBar").score).toBe(6);
    expect(matcher.evaluate("fb", "foobar").score).toBe(-4);
  });

  it("caps the leading letter penalty", () => {
    expect(matcher.evaluate("x", "ax").score).toBe(-4);
    expect(matcher.evaluate("x", "aax").score).toBe(-8);
    expect(matcher.evaluate("x", "aaax").score).toBe(-12);
    // from here on only the unmatched penalty grows
    expect(matcher.evaluate("x", "aaaax").score).toBe(-13);
    expect(matcher.evaluate("x", "aaaaax").score).toBe(-14);
  });

  it("charges unmatched characters after the last match", () => {
    expect(matcher.evaluate("ab", "ab").score).toBe(5);
    expect(matcher.evaluate("ab", "abxx").score).toBe(3);
  });

  it("handles repeated characters in query and key", () => {
    expect(matcher.evaluate("aa", "aaa")).toEqual({ matched: true, score: 4 });
  });

  it("gives an exact match the best score for its key", () => {
    expect(matcher.evaluate("abc", "abc").score).toBe(10);
    expect(matcher.evaluate("abc", "abc").score).toBeGreaterThan(matcher.evaluate("ac", "abc").score);
  });

  it("is deterministic across calls and key lengths", () => {
    const first = matcher.evaluate("ab", "a-b");
    matcher.evaluate("configuration", "a rather long key about configuration files");
    expect(matcher.evaluate("ab", "a-b")).toEqual(first);
  });

  it("uses the weights it was built with", () => {
    const custom = new AlignmentMatcher(createScoreModel({ separatorBonus: 15, maxLeadingLetterPenalty: -6 }));
    expect(custom.evaluate("ab", "a-b").score).toBe(14);
    expect(custom.evaluate("x", "aaax").score).toBe(-9);
  });

  it("agrees with an exhaustive search over all alignments", () => {
    const keyChars = "aAbB-_ 1x";
    const queryChars = "abAB-1";
    let seed = 11;
    const next = (bound: number): number => {
      seed = (seed * 48271) % 2147483647;
      return seed % bound;
    };
    const pick = (chars: string, len: number): string => {
      let out = "";
      for (let i = 0; i < len; i++) out += chars[next(chars.length)] ?? "";
      return out;
    };

    for (let round = 0; round < 500; round++) {
      const key = pick(keyChars, 1 + next(8));
      const query = pick(queryChars, 1 + next(3));
      expect(matcher.evaluate(query, key), `${query} in ${key}`).toEqual(bestAlignment(query, key));
    }
  });
});
