/**
 * Weights used by the matcher. Bonuses are added per matched character,
 * penalties per unmatched or leading character.
 */
export interface ScoreModel {
  /** Matched character directly follows the previous matched character. */
  readonly adjacencyBonus: number;
  /** Matched character is uppercase and preceded by a lowercase letter. */
  readonly camelBonus: number;
  /** Matched character follows a non-alphanumeric character. */
  readonly separatorBonus: number;
  /** Per key character before the first match. */
  readonly leadingLetterPenalty: number;
  /** Floor for the accumulated leading penalty. */
  readonly maxLeadingLetterPenalty: number;
  /** Per key character left out of the alignment. */
  readonly unmatchedLetterPenalty: number;
}

export type ScoreOptions = Partial<ScoreModel>;

export const DEFAULT_SCORE_MODEL: ScoreModel = Object.freeze({
  adjacencyBonus: 5,
  camelBonus: 10,
  separatorBonus: 10,
  leadingLetterPenalty: -3,
  maxLeadingLetterPenalty: -9,
  unmatchedLetterPenalty: -1,
});
