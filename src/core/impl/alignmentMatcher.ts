import type { MatchOutcome } from "../types.js";
import type { Matcher } from "../matcher.js";
import type { ScoreModel } from "../scoreModel.js";
import { DEFAULT_SCORE_MODEL } from "../scoreModel.js";

const NO_MATCH: MatchOutcome = Object.freeze({ matched: false, score: 0 });
const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;

function isSeparator(ch: string): boolean {
  return !LETTER_OR_DIGIT.test(ch);
}

function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function isLower(ch: string): boolean {
  return ch !== ch.toUpperCase() && ch === ch.toLowerCase();
}

// Lowercases one code point and keeps the first code point of the result,
// so "İ" (lowercase "i" + combining dot) still compares equal to "i".
function fold(ch: string): string {
  const first = ch.toLowerCase().codePointAt(0);
  return first === undefined ? ch : String.fromCodePoint(first);
}

/**
 * Optimal-alignment fuzzy matcher.
 *
 * Query and key are compared one code point at a time, case folded. Lengths
 * and positions below count code points, not UTF-16 units.
 *
 * Every alignment uses exactly |query| key characters, so the unmatched
 * penalty is the constant `(|key| - |query|) * unmatchedLetterPenalty` and the
 * DP only has to maximise the bonuses:
 *
 *   at(i, j)   best score with query[i] matched at key[j]
 *   upto(i, j) max over k <= j of at(i, k)
 *
 *   at(0, j) = lead(j) + bonus(j)
 *   at(i, j) = bonus(j) + max(at(i-1, j-1) + adjacency, upto(i-1, j-2))
 *
 * Two rows of each are kept in a scratch buffer owned by the instance, so
 * one matcher must not be shared between concurrently running evaluations
 * (evaluate is synchronous, which rules that out on a single thread).
 */
export class AlignmentMatcher implements Matcher {
  private scratch = new Float64Array(0);

  constructor(readonly model: ScoreModel = DEFAULT_SCORE_MODEL) {}

  evaluate(query: string, key: string): MatchOutcome {
    if (query.length === 0) return { matched: true, score: 0 };

    const q = Array.from(query, fold);
    const chars = Array.from(key);
    const m = q.length;
    const n = chars.length;
    if (n === 0 || m > n) return NO_MATCH;

    const k = chars.map(fold);
    if (!isSubsequence(q, k)) return NO_MATCH;

    const best = this.align(q, k, chars);
    if (best === -Infinity) return NO_MATCH;

    return { matched: true, score: best + (n - m) * this.model.unmatchedLetterPenalty };
  }

  private align(q: string[], k: string[], key: string[]): number {
    const m = q.length;
    const n = k.length;
    const { adjacencyBonus, camelBonus, separatorBonus, leadingLetterPenalty, maxLeadingLetterPenalty } = this.model;

    if (this.scratch.length < n * 4) this.scratch = new Float64Array(n * 4);
    const buf = this.scratch;
    // rows: [prevAt | prevUpto | curAt | curUpto], each n wide
    let prevAt = 0;
    let prevUpto = n;
    let curAt = 2 * n;
    let curUpto = 3 * n;

    const bonus = (j: number): number => {
      if (j === 0) return 0;
      const prev = key[j - 1]!;
      let b = 0;
      if (isSeparator(prev)) b += separatorBonus;
      if (isLower(prev) && isUpper(key[j]!)) b += camelBonus;
      return b;
    };

    let running = -Infinity;
    for (let j = 0; j < n; j++) {
      let s = -Infinity;
      if (k[j] === q[0]) {
        const lead = j === 0 ? 0 : Math.max(leadingLetterPenalty * j, maxLeadingLetterPenalty);
        s = bonus(j) + lead;
      }
      buf[curAt + j] = s;
      running = Math.max(running, s);
      buf[curUpto + j] = running;
    }

    for (let i = 1; i < m; i++) {
      [prevAt, curAt] = [curAt, prevAt];
      [prevUpto, curUpto] = [curUpto, prevUpto];

      running = -Infinity;
      for (let j = 0; j < n; j++) {
        let s = -Infinity;
        if (j >= i && k[j] === q[i]) {
          const adjacent = buf[prevAt + j - 1]! + adjacencyBonus;
          const gapped = j >= 2 ? buf[prevUpto + j - 2]! : -Infinity;
          const from = Math.max(adjacent, gapped);
          if (from !== -Infinity) s = bonus(j) + from;
        }
        buf[curAt + j] = s;
        running = Math.max(running, s);
        buf[curUpto + j] = running;
      }
    }

    return buf[curUpto + n - 1]!;
  }
}

function isSubsequence(q: string[], k: string[]): boolean {
  let i = 0;
  for (let j = 0; j < k.length && i < q.length; j++) {
    if (k[j] === q[i]) i++;
  }
  return i === q.length;
}
