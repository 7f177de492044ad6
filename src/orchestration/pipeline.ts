/**
 * KYC intake pipeline: extraction → normalisation → validation → rendering →
 * notification, run once per transcript.
 *
 * Extraction is the only long suspension and is bounded by a timeout that
 * aborts the backend call. Extraction failure stops the run before any sink
 * is called; sink failures are recorded and the record is kept.
 */

import { randomUUID } from "node:crypto";
import { ExtractionFailure, SinkFailure, errorMessage } from "../errors.js";
import type { ExtractionBackend } from "../extraction/backend.js";
import { silentLogger, type Logger } from "../logger.js";
import { normalizeWithReport } from "../kyc/normaliser.js";
import type { KycRecord } from "../kyc/schema.js";
import { validate, withExemption, type ValidationResult } from "../kyc/validator.js";
import type { NotificationSink, RenderSink, SinkContext } from "../sinks/types.js";
import type {
  IntakeRequest,
  PipelineResult,
  PipelineStage,
  StageError,
} from "./types.js";

export { PIPELINE_STAGE_ORDER } from "./types.js";

export const DEFAULT_EXTRACTION_TIMEOUT_MS = 120_000;

export interface PipelineDeps {
  backend: ExtractionBackend;
  renderer?: RenderSink;
  notifier?: NotificationSink;
  logger?: Logger;
  timeoutMs?: number;
  totalsTolerance?: number;
  /** Reference date (YYYY-MM-DD); defaults to the call date, then today. */
  asOf?: string;
  runId?: string;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Result factory and stage bookkeeping
// ---------------------------------------------------------------------------

/** A fresh result in `processing` state with every stage pending. */
export function createPipelineResult(
  runId: string,
  request: Pick<IntakeRequest, "client_id" | "form_type">,
  startedAt: string = new Date().toISOString()
): PipelineResult {
  return {
    run_id: runId,
    client_id: request.client_id ?? null,
    form_type: request.form_type,
    status: "processing",
    failed_stage: null,
    record: null,
    validation: null,
    document: null,
    notification: null,
    errors: [],
    forbidden_fields_stripped: [],
    stages: {
      extraction: { status: "pending" },
      normalisation: { status: "pending" },
      validation: { status: "pending" },
      rendering: { status: "pending" },
      notification: { status: "pending" },
    },
    started_at: startedAt,
  };
}

function errorKind(err: unknown): string {
  if (err instanceof ExtractionFailure) return err.reason;
  if (err instanceof Error) return err.name;
  return "unknown";
}

class StageTracker {
  constructor(
    private readonly result: PipelineResult,
    private readonly now: () => Date
  ) {}

  start(stage: PipelineStage): void {
    this.result.stages[stage] = { status: "in_progress", started_at: this.now().toISOString() };
  }

  complete(stage: PipelineStage): void {
    this.result.stages[stage] = {
      ...this.result.stages[stage],
      status: "complete",
      completed_at: this.now().toISOString(),
    };
  }

  skip(...stages: PipelineStage[]): void {
    for (const stage of stages) this.result.stages[stage] = { status: "skipped" };
  }

  fail(stage: PipelineStage, err: unknown): StageError {
    const error: StageError = { stage, kind: errorKind(err), message: errorMessage(err) };
    this.result.stages[stage] = {
      ...this.result.stages[stage],
      status: "failed",
      completed_at: this.now().toISOString(),
      error: error.message,
    };
    this.result.errors.push(error);
    this.result.failed_stage ??= stage;
    return error;
  }
}

// ---------------------------------------------------------------------------
// Extraction with timeout
// ---------------------------------------------------------------------------

async function extractWithTimeout(
  backend: ExtractionBackend,
  request: IntakeRequest,
  timeoutMs: number
): Promise<unknown> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ExtractionFailure("timeout", `Extraction exceeded ${timeoutMs} ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      backend.extract(request.transcript, request.source_language, request.form_type, {
        signal: controller.signal,
      }),
      timeout,
    ]);
  } catch (err) {
    if (err instanceof ExtractionFailure) throw err;
    throw new ExtractionFailure("backend_error", `Extraction failed: ${errorMessage(err)}`, {
      cause: err,
    });
  } finally {
    clearTimeout(timer);
  }
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/**
 * Run one transcript through the pipeline. Always resolves; failures are
 * reported through `status`, `failed_stage` and `errors`.
 */
export async function runKycPipeline(
  request: IntakeRequest,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const now = deps.now ?? (() => new Date());
  const runId = deps.runId ?? randomUUID();
  const result = createPipelineResult(runId, request, now().toISOString());
  const stages = new StageTracker(result, now);
  const asOf = deps.asOf ?? request.call_date ?? now().toISOString().slice(0, 10);
  const log = (deps.logger ?? silentLogger).child({
    run_id: runId,
    client_id: result.client_id,
  });

  const finish = (): PipelineResult => {
    result.completed_at = now().toISOString();
    log.info(
      { status: result.status, failed_stage: result.failed_stage, category: result.validation?.category },
      "kyc run finished"
    );
    return result;
  };

  log.info(
    { form_type: request.form_type, language: request.source_language, chars: request.transcript.length },
    "kyc run started"
  );

  // ── Extraction ────────────────────────────────────────────────────────────
  stages.start("extraction");
  let raw: unknown;
  try {
    raw = await extractWithTimeout(
      deps.backend,
      request,
      deps.timeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS
    );
    stages.complete("extraction");
  } catch (err) {
    const error = stages.fail("extraction", err);
    stages.skip("normalisation", "validation", "rendering", "notification");
    log.error({ reason: error.kind, err: error.message }, "extraction failed");
    result.status = "extraction_failed";
    return finish();
  }

  // ── Normalisation + validation ────────────────────────────────────────────
  stages.start("normalisation");
  let record: KycRecord;
  try {
    const outcome = normalizeWithReport(raw, request.source_language, {
      formType: request.form_type,
      totalsTolerance: deps.totalsTolerance,
      asOf,
    });
    record = outcome.record;
    const { report } = outcome;
    result.record = record;
    result.forbidden_fields_stripped = report.forbiddenFieldsPresent;
    if (report.forbiddenFieldsPresent.length > 0) {
      log.warn(
        { paths: report.forbiddenFieldsPresent },
        "extraction returned forbidden fields; values discarded"
      );
    }
    if (report.rejectedValues.length > 0) {
      log.debug({ paths: report.rejectedValues }, "uncoercible values set to null");
    }
    stages.complete("normalisation");
  } catch (err) {
    stages.fail("normalisation", err);
    stages.skip("validation", "rendering", "notification");
    log.error({ err: errorMessage(err) }, "normalisation failed");
    result.status = "validation_error";
    return finish();
  }

  stages.start("validation");
  let validation: ValidationResult;
  try {
    validation = validate(record, { formType: request.form_type, asOf });
    record = withExemption(record, validation);
    result.validation = validation;
    result.record = record;
    stages.complete("validation");
    if (validation.red_flags.length > 0) {
      log.warn({ red_flags: validation.red_flags }, "red flags raised");
    }
  } catch (err) {
    stages.fail("validation", err);
    stages.skip("rendering", "notification");
    log.error({ err: errorMessage(err) }, "validation failed");
    result.status = "validation_error";
    return finish();
  }

  result.status = "completed";

  const sinkContext: SinkContext = {
    runId,
    clientId: result.client_id,
    dealingRep: request.dealing_rep,
    asOf,
    logger: log,
  };

  // ── Rendering ─────────────────────────────────────────────────────────────
  if (deps.renderer) {
    stages.start("rendering");
    try {
      result.document = await deps.renderer.render(record, request.form_type, sinkContext);
      stages.complete("rendering");
    } catch (err) {
      const failure =
        err instanceof SinkFailure
          ? err
          : new SinkFailure("rendering", errorMessage(err), { cause: err });
      stages.fail("rendering", failure);
      log.error({ err: failure.message }, "rendering failed");
    }
  } else {
    stages.skip("rendering");
  }

  // ── Notification ──────────────────────────────────────────────────────────
  if (deps.notifier) {
    stages.start("notification");
    try {
      result.notification = await deps.notifier.notify(
        record,
        validation,
        result.document,
        sinkContext
      );
      stages.complete("notification");
    } catch (err) {
      const failure =
        err instanceof SinkFailure
          ? err
          : new SinkFailure("notification", errorMessage(err), { cause: err });
      stages.fail("notification", failure);
      log.error({ err: failure.message }, "notification failed");
    }
  } else {
    stages.skip("notification");
  }

  return finish();
}
