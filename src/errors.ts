/**
 * Error types surfaced by the intake pipeline.
 *
 * Malformed extraction output is never an error (the normaliser coerces it to
 * nulls); these cover the failures a caller has to act on.
 */

export type ExtractionFailureReason =
  | "timeout"
  | "unreachable"
  | "unparseable"
  | "backend_error";

/** The extraction backend could not produce a raw record. No record exists. */
export class ExtractionFailure extends Error {
  readonly name = "ExtractionFailure";

  constructor(
    readonly reason: ExtractionFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type SinkName = "rendering" | "notification";

/** A downstream sink failed. The record it was handed is still valid. */
export class SinkFailure extends Error {
  readonly name = "SinkFailure";

  constructor(
    readonly sink: SinkName,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The ingress payload or its transcript was rejected before a run started. */
export class IntakeRejected extends Error {
  readonly name = "IntakeRejected";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
