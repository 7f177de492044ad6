/**
 * Extraction backend capability. The core only knows this interface; which
 * model or service fills it in is a deployment choice.
 */

import type { FormType, SourceLanguage } from "../kyc/schema.js";

export interface ExtractionRequestOptions {
  /** Aborted when the pipeline's extraction timeout fires. */
  signal?: AbortSignal;
}

export interface ExtractionBackend {
  /**
   * Attempt every schema field from the transcript and return the raw,
   * untrusted JSON tree. Must return null/absent instead of inventing values,
   * and must not return SIN or bank account content.
   *
   * Rejects with ExtractionFailure when no usable output was produced.
   */
  extract(
    transcript: string,
    language: SourceLanguage,
    formType: FormType,
    options?: ExtractionRequestOptions
  ): Promise<unknown>;
}
