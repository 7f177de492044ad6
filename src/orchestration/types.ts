/**
 * Orchestration layer types: run requests, per-stage status, and the result
 * a pipeline run reports back to the trigger layer.
 */

import type { FormType, KycRecord, SourceLanguage } from "../kyc/schema.js";
import type { ValidationResult } from "../kyc/validator.js";
import type { Ack, DocumentHandle } from "../sinks/types.js";

// ---------------------------------------------------------------------------
// Pipeline stages (in execution order)
// ---------------------------------------------------------------------------

export type PipelineStage =
  | "extraction"     // ExtractionBackend.extract → raw JSON
  | "normalisation"  // normalize                 → KycRecord
  | "validation"     // validate                  → ValidationResult
  | "rendering"      // RenderSink.render         → DocumentHandle
  | "notification";  // NotificationSink.notify   → Ack

/** Ordered list of all pipeline stages. */
export const PIPELINE_STAGE_ORDER: PipelineStage[] = [
  "extraction",
  "normalisation",
  "validation",
  "rendering",
  "notification",
];

// ---------------------------------------------------------------------------
// Stage status
// ---------------------------------------------------------------------------

export type StageStatus =
  | "pending"      // Not yet started
  | "in_progress"  // Running
  | "complete"     // Finished with output
  | "skipped"      // No sink configured, or an earlier stage failed
  | "failed";

export interface PipelineStageStatus {
  status: StageStatus;
  started_at?: string;   // ISO 8601
  completed_at?: string; // ISO 8601
  /** Human-readable error if status === "failed". */
  error?: string;
}

// ---------------------------------------------------------------------------
// Run request and result
// ---------------------------------------------------------------------------

/** A transcript already normalised to plain text, ready for extraction. */
export interface IntakeRequest {
  transcript: string;
  source_language: SourceLanguage;
  form_type: FormType;
  dealing_rep?: string;
  /** Opaque caller identifier, echoed back on the result. */
  client_id?: string;
  /** Date of the call (YYYY-MM-DD); ages and form dates are computed at it. */
  call_date?: string;
}

export type PipelineStatus =
  | "processing"
  | "completed"
  | "extraction_failed"
  | "validation_error";

export interface StageError {
  stage: PipelineStage;
  /** Error class name, or the ExtractionFailure reason. */
  kind: string;
  message: string;
}

export interface PipelineResult {
  run_id: string;
  client_id: string | null;
  form_type: FormType;
  status: PipelineStatus;
  /** First stage that failed; a sink here leaves status "completed". */
  failed_stage: PipelineStage | null;
  record: KycRecord | null;
  validation: ValidationResult | null;
  document: DocumentHandle | null;
  notification: Ack | null;
  errors: StageError[];
  /** Forbidden paths the backend returned; all were discarded. */
  forbidden_fields_stripped: string[];
  stages: Partial<Record<PipelineStage, PipelineStageStatus>>;
  started_at: string;
  completed_at?: string;
}
