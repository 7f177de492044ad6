/**
 * Tool-level tests for the MCP server, driven through an in-memory client
 * transport. The extraction backend is a vi.fn() stub.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ExtractionBackend } from "../src/extraction/backend.js";
import { isPlainObject } from "../src/kyc/coerce.js";
import { validate } from "../src/kyc/validator.js";
import { KycIntakeService } from "../src/orchestration/intake.js";
import { createPipelineResult } from "../src/orchestration/pipeline.js";
import { createServer, runReview, validationReview } from "../src/server.js";
import { AS_OF, normalisedRecord, rawExtraction } from "../src/tests/kyc/fixtures.js";

// ---------------------------------------------------------------------------
// Harness
// ---------------------------------------------------------------------------

const TRANSCRIPT =
  "REP: What is your annual income?\nCLIENT: About one hundred eighty thousand dollars.";

const clients: Client[] = [];

afterEach(async () => {
  await Promise.all(clients.splice(0).map((client) => client.close()));
});

async function connect(raw: unknown = rawExtraction()) {
  const extract = vi.fn<ExtractionBackend["extract"]>().mockResolvedValue(raw);
  const intake = new KycIntakeService({ backend: { extract } });
  const server = createServer({ intake });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: "test-client", version: "0.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  clients.push(client);
  return { client, intake, extract };
}

async function callTool(client: Client, name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== "text") throw new Error(`${name} returned no text content`);
  const body: unknown = JSON.parse(first.text);
  return { isError: result.isError === true, body };
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

describe("MCP server tools", () => {
  it("registers the intake tools", async () => {
    const { client } = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "get_intake_status",
      "ping",
      "process_transcript",
      "submit_transcript",
      "validate_kyc_record",
    ]);
  });

  it("ping reports the server identity", async () => {
    const { client } = await connect();
    const { body } = await callTool(client, "ping");
    expect(body).toEqual({
      ok: true,
      server: "kyc-intake-mcp",
      version: "0.1.0",
      flagForReview: false,
    });
  });

  it("process_transcript returns the finished run", async () => {
    const { client, extract } = await connect();
    const { isError, body } = await callTool(client, "process_transcript", {
      transcript: TRANSCRIPT,
      source_language: "uk",
      call_date: AS_OF,
    });

    expect(isError).toBe(false);
    expect(body).toMatchObject({
      status: "completed",
      form_type: "individual",
      failed_stage: null,
      validation: { category: "ELIGIBLE", red_flags: [] },
      record: { exemption_status: { is_accredited: false, is_eligible: true } },
      flagForReview: false,
    });
    expect(extract.mock.calls[0]?.[1]).toBe("uk");
  });

  it("process_transcript reports a rejected transcript as a tool error", async () => {
    const { client, extract } = await connect();
    const { isError, body } = await callTool(client, "process_transcript", {
      transcript: "  Hi, call me back.  ",
    });

    expect(isError).toBe(true);
    expect(body).toEqual({ error: "Transcript too short (17 chars). Minimum is 50." });
    expect(extract).not.toHaveBeenCalled();
  });

  it("submit_transcript hands back a run id that get_intake_status resolves", async () => {
    const { client, intake } = await connect(
      rawExtraction({ aml: { is_pep: true, pep_position: "Deputy Minister" } })
    );

    const submitted = await callTool(client, "submit_transcript", {
      transcript: TRANSCRIPT,
      client_id: "client-42",
      call_date: AS_OF,
    });
    expect(submitted.body).toMatchObject({ status: "processing", flagForReview: false });

    const runId = runIdOf(submitted.body);
    expect(intake.get(runId)).toBeDefined();
    await intake.settled(runId);

    const status = await callTool(client, "get_intake_status", { run_id: runId });
    expect(status.body).toMatchObject({
      run_id: runId,
      client_id: "client-42",
      status: "completed",
      validation: { red_flags: ["PEP"] },
      flagForReview: true,
      flagReason: "red flags: PEP",
    });
  });

  it("get_intake_status rejects an unknown run id", async () => {
    const { client } = await connect();
    const { isError, body } = await callTool(client, "get_intake_status", { run_id: "nope" });
    expect(isError).toBe(true);
    expect(body).toEqual({ error: "Unknown run_id: nope" });
  });

  it("validate_kyc_record classifies a raw record and strips forbidden fields", async () => {
    const { client, extract } = await connect();
    const { isError, body } = await callTool(client, "validate_kyc_record", {
      record: rawExtraction({
        sin: "000-000-000",
        financials: { net_financial_assets: 1_500_000 },
      }),
      source_language: "en",
      as_of: AS_OF,
    });

    expect(isError).toBe(false);
    expect(body).toMatchObject({
      record: {
        sin: null,
        exemption_status: {
          is_accredited: true,
          accreditation_reason: expect.stringContaining("net_financial_assets >= 1,000,000"),
        },
      },
      validation: { category: "ACCREDITED", warnings: ["NFA_VERIFICATION_REQUIRED"] },
      forbidden_fields_stripped: ["sin"],
      flagForReview: false,
    });
    expect(extract).not.toHaveBeenCalled();
  });
});

function runIdOf(body: unknown): string {
  if (isPlainObject(body) && typeof body.run_id === "string") return body.run_id;
  throw new Error("submit_transcript returned no run_id");
}

// ---------------------------------------------------------------------------
// Review flags
// ---------------------------------------------------------------------------

describe("review flags", () => {
  it("flags a validation that needs follow-up with its reasons", () => {
    const validation = validate(
      normalisedRecord({
        aml: { is_hio: true },
        address: { city: null },
        contact: { email: null },
        personal: { dob: null },
        employment: { occupation: null },
      }),
      { asOf: AS_OF }
    );

    expect(validationReview(validation)).toEqual({
      flagForReview: true,
      flagReason: "red flags: HIO; 4 required field(s) missing",
    });
  });

  it("flags suitability concerns even without red flags", () => {
    const validation = validate(
      normalisedRecord({
        investment_profile: { investment_objective: "GROWTH", risk_tolerance: "LOW" },
      }),
      { asOf: AS_OF }
    );

    expect(validationReview(validation)).toEqual({
      flagForReview: true,
      flagReason: "suitability: GROWTH_WITH_LOW_TOLERANCE",
    });
  });

  it("does not flag a run that is still processing", () => {
    const pending = createPipelineResult("run-1", { form_type: "individual" });
    expect(runReview(pending)).toEqual({ flagForReview: false });
  });

  it("flags a failed run with its first error", () => {
    const failed = createPipelineResult("run-1", { form_type: "individual" });
    failed.status = "extraction_failed";
    failed.errors.push({ stage: "extraction", kind: "timeout", message: "Extraction exceeded 20 ms" });
    expect(runReview(failed)).toEqual({
      flagForReview: true,
      flagReason: "Extraction exceeded 20 ms",
    });
  });

  it("flags a completed run whose sink failed", () => {
    const record = normalisedRecord();
    const run = createPipelineResult("run-1", { form_type: "individual" });
    run.status = "completed";
    run.record = record;
    run.validation = validate(record, { asOf: AS_OF });
    run.failed_stage = "rendering";
    expect(runReview(run)).toEqual({ flagForReview: true, flagReason: "rendering failed" });
  });
});
