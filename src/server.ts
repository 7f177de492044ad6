/**
 * MCP server factory: creates server with stdio transport and tool registration.
 * All tools conform to the ToolOutput contract (see src/types.ts).
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { normalizeWithReport } from "./kyc/normaliser.js";
import { FORM_TYPES, SOURCE_LANGUAGES } from "./kyc/schema.js";
import { validate, withExemption, type ValidationResult } from "./kyc/validator.js";
import { intakeRequestShape, type KycIntakeService } from "./orchestration/intake.js";
import type { PipelineResult } from "./orchestration/types.js";
import { toToolError, toToolResult, type ToolOutput } from "./types.js";

export const SERVER_NAME = "kyc-intake-mcp";
export const SERVER_VERSION = "0.1.0";

export interface ServerDeps {
  intake: KycIntakeService;
  /** Used by validate_kyc_record; runs take theirs from the intake service. */
  totalsTolerance?: number;
}

// ---------------------------------------------------------------------------
// Review flags
// ---------------------------------------------------------------------------

export function validationReview(validation: ValidationResult): ToolOutput {
  if (!validation.follow_up_needed) return { flagForReview: false };
  const reasons: string[] = [];
  if (validation.red_flags.length > 0) reasons.push(`red flags: ${validation.red_flags.join(", ")}`);
  if (validation.suitability_concerns.length > 0) {
    reasons.push(`suitability: ${validation.suitability_concerns.join(", ")}`);
  }
  if (validation.missing_required.length > 0) {
    reasons.push(`${validation.missing_required.length} required field(s) missing`);
  }
  return { flagForReview: true, flagReason: reasons.join("; ") };
}

export function runReview(result: PipelineResult): ToolOutput {
  if (result.status === "processing") return { flagForReview: false };
  if (result.status !== "completed") {
    return { flagForReview: true, flagReason: result.errors[0]?.message ?? result.status };
  }
  if (result.validation?.follow_up_needed) return validationReview(result.validation);
  if (result.failed_stage) {
    return { flagForReview: true, flagReason: `${result.failed_stage} failed` };
  }
  return { flagForReview: false };
}

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

export function createServer(deps: ServerDeps): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // -------------------------------------------------------------------------
  // ping: health check
  // -------------------------------------------------------------------------
  server.registerTool(
    "ping",
    {
      description: "Health check for the KYC intake MCP server",
      inputSchema: {},
    },
    async (): Promise<CallToolResult> =>
      toToolResult({
        ok: true,
        server: SERVER_NAME,
        version: SERVER_VERSION,
        flagForReview: false,
      })
  );

  // -------------------------------------------------------------------------
  // submit_transcript: background run
  // -------------------------------------------------------------------------
  server.registerTool(
    "submit_transcript",
    {
      description:
        "Start KYC intake for a client call transcript. Normalises the transcript, then extracts, " +
        "validates and files it in the background. Returns a run_id to poll with get_intake_status.",
      inputSchema: intakeRequestShape,
    },
    async (args): Promise<CallToolResult> => {
      try {
        const receipt = await deps.intake.submit(args);
        return toToolResult({ ...receipt, flagForReview: false });
      } catch (err) {
        return toToolError(err);
      }
    }
  );

  // -------------------------------------------------------------------------
  // get_intake_status
  // -------------------------------------------------------------------------
  server.registerTool(
    "get_intake_status",
    {
      description:
        "Look up a KYC intake run. Returns its status (processing, completed, extraction_failed, " +
        "validation_error), the normalised record, validation flags and sink outcomes.",
      inputSchema: {
        run_id: z.string().min(1).describe("run_id returned by submit_transcript"),
      },
    },
    async (args): Promise<CallToolResult> => {
      const result = deps.intake.get(args.run_id);
      if (!result) return toToolError(`Unknown run_id: ${args.run_id}`);
      return toToolResult({ ...result, ...runReview(result) });
    }
  );

  // -------------------------------------------------------------------------
  // process_transcript: synchronous run
  // -------------------------------------------------------------------------
  server.registerTool(
    "process_transcript",
    {
      description:
        "Run KYC intake for a transcript and wait for the result. Same input as submit_transcript.",
      inputSchema: intakeRequestShape,
    },
    async (args): Promise<CallToolResult> => {
      try {
        const result = await deps.intake.runSync(args);
        return toToolResult({ ...result, ...runReview(result) });
      } catch (err) {
        return toToolError(err);
      }
    }
  );

  // -------------------------------------------------------------------------
  // validate_kyc_record: normalise + validate without calling a model
  // -------------------------------------------------------------------------
  server.registerTool(
    "validate_kyc_record",
    {
      description:
        "Normalise a raw KYC JSON record (as an extraction model would return it) and classify it " +
        "under NI 45-106, with AML and suitability flags. Does not call a model or any sink.",
      inputSchema: {
        record: z
          .record(z.string(), z.unknown())
          .describe("Raw KYC record, sections keyed as in the extraction schema"),
        source_language: z.enum(SOURCE_LANGUAGES).default("auto"),
        form_type: z.enum(FORM_TYPES).default("individual"),
        as_of: z
          .string()
          .regex(/^\d{4}-\d{2}-\d{2}$/, "as_of must be YYYY-MM-DD")
          .optional()
          .describe("Date ages are computed at (default: today)"),
      },
    },
    async (args): Promise<CallToolResult> => {
      try {
        const { record, report } = normalizeWithReport(args.record, args.source_language, {
          formType: args.form_type,
          totalsTolerance: deps.totalsTolerance,
          asOf: args.as_of,
        });
        const validation = validate(record, { formType: args.form_type, asOf: args.as_of });
        return toToolResult({
          record: withExemption(record, validation),
          validation,
          forbidden_fields_stripped: report.forbiddenFieldsPresent,
          ...validationReview(validation),
        });
      } catch (err) {
        return toToolError(err);
      }
    }
  );

  return server;
}

export function createStdioTransport(): StdioServerTransport {
  return new StdioServerTransport();
}
