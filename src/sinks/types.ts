/**
 * Sink contracts. The pipeline hands a validated record to a renderer and a
 * notifier; a sink failure is reported on the run, never fatal to the record.
 */

import type { Logger } from "../logger.js";
import type { FormType, KycRecord } from "../kyc/schema.js";
import type { ValidationResult } from "../kyc/validator.js";

export interface SinkContext {
  runId: string;
  clientId: string | null;
  /** Representative named on the form; falls back to the sink's configured default. */
  dealingRep?: string;
  /** Date (YYYY-MM-DD) printed on rendered documents. */
  asOf: string;
  logger: Logger;
}

export interface DocumentHandle {
  path: string;
  form_type: FormType;
  /** Number of template fields that received a value. */
  fields_filled: number;
  /** Mapped field names the template does not have. */
  fields_missing: string[];
}

export interface Ack {
  /** Provider message id, when the provider returned one. */
  id: string | null;
  recipients: string[];
  sent_at: string;
}

export interface RenderSink {
  /** Rejects with SinkFailure("rendering"). */
  render(record: KycRecord, formType: FormType, context: SinkContext): Promise<DocumentHandle>;
}

export interface NotificationSink {
  /** Rejects with SinkFailure("notification"). */
  notify(
    record: KycRecord,
    validation: ValidationResult,
    document: DocumentHandle | null,
    context: SinkContext
  ): Promise<Ack>;
}
