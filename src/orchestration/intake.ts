/**
 * Intake service: the ingress trigger's view of the pipeline.
 *
 * `submit` validates the payload, normalises the transcript and starts a run
 * in the background; `get` reports the run's latest state. Results live in an
 * in-memory map keyed by run id; past `maxRetainedResults` the oldest finished
 * runs are dropped.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { IntakeRejected, errorMessage } from "../errors.js";
import { silentLogger } from "../logger.js";
import { FORM_TYPES, SOURCE_LANGUAGES } from "../kyc/schema.js";
import {
  TRANSCRIPT_FORMATS,
  introducedName,
  prepareTranscript,
} from "../transcript/normaliser.js";
import { createPipelineResult, runKycPipeline, type PipelineDeps } from "./pipeline.js";
import type { IntakeRequest, PipelineResult } from "./types.js";

export const intakeRequestShape = {
  transcript: z
    .string()
    .min(1)
    .describe(
      "The call transcript. For txt/whisper_json: the raw string. " +
        "For docx_base64: the base64-encoded document bytes."
    ),
  source_language: z
    .enum(SOURCE_LANGUAGES)
    .default("auto")
    .describe("Language of the call (ru, uk, en, or auto)"),
  form_type: z
    .enum(FORM_TYPES)
    .default("individual")
    .describe("Form to fill: individual, corporate, or trade_suitability"),
  transcript_format: z
    .enum(TRANSCRIPT_FORMATS)
    .default("txt")
    .describe("Input format (default: txt)"),
  dealing_rep: z.string().min(1).optional().describe("Dealing representative named on the form"),
  client_id: z.string().min(1).optional().describe("Opaque caller identifier, echoed back"),
  call_date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "call_date must be YYYY-MM-DD")
    .optional()
    .describe("Date of the call (YYYY-MM-DD); defaults to today"),
};

export const intakeRequestSchema = z.object(intakeRequestShape);
export type IntakeInput = z.input<typeof intakeRequestSchema>;

export interface SubmitReceipt {
  run_id: string;
  status: "processing";
  /** Name the client introduced themselves with, when the transcript has one. */
  client_name: string | null;
}

export const DEFAULT_MAX_RETAINED_RESULTS = 1000;

export interface IntakeServiceDeps extends Omit<PipelineDeps, "runId"> {
  /** Finished results kept for `get`; the oldest are dropped first. */
  maxRetainedResults?: number;
}

/** Parse an ingress payload and turn its transcript into plain text. */
export async function prepareIntakeRequest(input: unknown): Promise<IntakeRequest> {
  const parsed = intakeRequestSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`)
      .join("; ");
    throw new IntakeRejected(`Invalid intake request: ${detail}`);
  }

  const { transcript_format, ...payload } = parsed.data;
  return {
    ...payload,
    transcript: await prepareTranscript(payload.transcript, transcript_format),
  };
}

export class KycIntakeService {
  private readonly results = new Map<string, PipelineResult>();
  private readonly inFlight = new Map<string, Promise<PipelineResult>>();

  private readonly deps: Omit<PipelineDeps, "runId">;
  private readonly maxRetainedResults: number;

  constructor({ maxRetainedResults, ...deps }: IntakeServiceDeps) {
    this.deps = deps;
    this.maxRetainedResults = maxRetainedResults ?? DEFAULT_MAX_RETAINED_RESULTS;
  }

  /** Start a run and return at once. Rejects with IntakeRejected on a bad payload. */
  async submit(input: unknown): Promise<SubmitReceipt> {
    const request = await prepareIntakeRequest(input);
    const runId = randomUUID();
    this.results.set(runId, createPipelineResult(runId, request));

    const run = this.execute(runId, request).finally(() => this.inFlight.delete(runId));
    this.inFlight.set(runId, run);
    return {
      run_id: runId,
      status: "processing",
      client_name: introducedName(request.transcript),
    };
  }

  /** Run to completion and return the result. */
  async runSync(input: unknown): Promise<PipelineResult> {
    const request = await prepareIntakeRequest(input);
    return this.execute(randomUUID(), request);
  }

  get(runId: string): PipelineResult | undefined {
    return this.results.get(runId);
  }

  /** Resolves when the run finishes; the result at once if it already has. */
  async settled(runId: string): Promise<PipelineResult | undefined> {
    return this.inFlight.get(runId) ?? this.results.get(runId);
  }

  private async execute(runId: string, request: IntakeRequest): Promise<PipelineResult> {
    let result: PipelineResult;
    try {
      result = await runKycPipeline(request, { ...this.deps, runId });
    } catch (err) {
      (this.deps.logger ?? silentLogger).error(
        { run_id: runId, err: errorMessage(err) },
        "kyc run crashed"
      );
      result = createPipelineResult(runId, request);
      result.status = "validation_error";
      result.failed_stage = "validation";
      result.errors.push({ stage: "validation", kind: "unknown", message: errorMessage(err) });
    }
    this.results.set(runId, result);
    this.evictFinished();
    return result;
  }

  private evictFinished(): void {
    let excess = this.results.size - this.maxRetainedResults;
    for (const [runId, result] of this.results) {
      if (excess <= 0) break;
      if (result.status === "processing") continue;
      this.results.delete(runId);
      excess -= 1;
    }
  }
}
