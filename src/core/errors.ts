export interface ConfigIssue {
  path: string;
  message: string;
}

export type EngineErrorCode = "INVALID_SCORE_MODEL" | "KEY_DERIVATION_FAILED";

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;
}

/** Raised when a ScoreModel fails validation. Fatal to the engine being built. */
export class ConfigurationError extends EngineError {
  override readonly code = "INVALID_SCORE_MODEL";
  override readonly name = "ConfigurationError";

  constructor(readonly issues: ConfigIssue[]) {
    super(`invalid score model: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`);
  }
}

/** A single candidate's sort key could not be produced. */
export class KeyDerivationError extends EngineError {
  override readonly code = "KEY_DERIVATION_FAILED";
  override readonly name = "KeyDerivationError";

  constructor(
    readonly index: number,
    cause: unknown,
  ) {
    super(`could not derive sort key for candidate ${index}: ${describe(cause)}`, { cause });
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
