/**
 * LLM-based extraction of a raw KYC record from a plain-text transcript.
 * Uses Anthropic Claude with tool_use to produce reliable structured output;
 * a JSON text reply is accepted as a fallback.
 */

import Anthropic from "@anthropic-ai/sdk";
import { ExtractionFailure, errorMessage } from "../errors.js";
import { extractionJsonSchema, type FormType, type SourceLanguage } from "../kyc/schema.js";
import type { ExtractionBackend, ExtractionRequestOptions } from "./backend.js";

export const DEFAULT_MODEL = "claude-sonnet-4-20250514";

const TOOL_NAME = "record_kyc_data";

const EXTRACTION_SYSTEM_PROMPT = `\
You are a KYC data extraction agent for a Canadian exempt market dealer. You read \
client call transcripts and record the client's know-your-client information.

Critical rules:
1. Never guess. If a value is not explicitly stated, leave it null.
2. Never record a Social Insurance Number or any bank account, transit or institution \
number, even if the client says it. Those are collected manually.
3. Transcripts may be in Russian, Ukrainian, English, or a mix. Translate every value to \
English and transliterate names to the Latin alphabet.
   Common terms: доход/дохід = income; чистая стоимость/чиста вартість = net worth; \
риск/ризик = risk; накопления/заощадження = savings; пенсия/пенсія = retirement; \
недвижимость/нерухомість = real estate.
4. Amounts are CAD numbers ("180 тысяч" = 180000).
5. Risk tolerance: LOW = "can't lose money", "safety first"; MODERATE = "some risk is fine", \
"long term"; HIGH = "maximise returns", "willing to lose".
6. Time horizon: 1-3 (short term), 3-5 (medium term), 6-10, 10+ (long term or retirement \
more than ten years away).
7. Do not decide exemption status; it is computed from the figures you record.
8. List anything unclear in ambiguous_items and suggest follow_up_questions for the \
dealing representative.`;

const EXTRACTION_TOOL: Anthropic.Tool = {
  name: TOOL_NAME,
  description: "Record the structured KYC data extracted from the transcript",
  input_schema: { ...extractionJsonSchema(), type: "object" },
};

/** The slice of the Anthropic client this backend calls. */
export interface MessagesApi {
  create(
    params: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; timeout?: number }
  ): Promise<{ content: Array<{ type: string; text?: string; input?: unknown }> }>;
}

export interface AnthropicBackendOptions {
  /** Falls back to ANTHROPIC_API_KEY. Ignored when `messages` is supplied. */
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  messages?: MessagesApi;
}

export class AnthropicExtractionBackend implements ExtractionBackend {
  private readonly messages: MessagesApi;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(options: AnthropicBackendOptions = {}) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? 4000;

    if (options.messages) {
      this.messages = options.messages;
    } else {
      const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
      if (!apiKey) {
        throw new Error(
          "Anthropic API key required. Set ANTHROPIC_API_KEY or pass options.apiKey."
        );
      }
      this.messages = new Anthropic({ apiKey, maxRetries: 0 }).messages;
    }
  }

  async extract(
    transcript: string,
    language: SourceLanguage,
    formType: FormType,
    options: ExtractionRequestOptions = {}
  ): Promise<unknown> {
    let response: Awaited<ReturnType<MessagesApi["create"]>>;
    try {
      response = await this.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          system: EXTRACTION_SYSTEM_PROMPT,
          tools: [EXTRACTION_TOOL],
          tool_choice: { type: "tool", name: TOOL_NAME },
          messages: [
            {
              role: "user",
              content:
                `Extract KYC data from this call transcript.\n\n` +
                `Source language hint: ${language}\nForm type: ${formType}\n\n` +
                `<transcript>\n${transcript}\n</transcript>`,
            },
          ],
        },
        { signal: options.signal }
      );
    } catch (err) {
      throw toExtractionFailure(err);
    }

    const toolUse = response.content.find((b) => b.type === "tool_use");
    if (toolUse && toolUse.input !== undefined) return toolUse.input;

    const textBlock = response.content.find((b) => b.type === "text");
    if (textBlock?.text) return parseJsonReply(textBlock.text);

    throw new ExtractionFailure(
      "unparseable",
      "Extraction model returned neither a tool_use block nor JSON text."
    );
  }
}

// ---------------------------------------------------------------------------
// Response parsing helpers
// ---------------------------------------------------------------------------

/** Parse a JSON reply, tolerating a surrounding markdown code fence. */
export function parseJsonReply(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const body = (fenced ? fenced[1] : text).trim();
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new ExtractionFailure(
      "unparseable",
      `Extraction model returned text that is not valid JSON: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

function toExtractionFailure(err: unknown): ExtractionFailure {
  if (err instanceof ExtractionFailure) return err;
  if (err instanceof Anthropic.APIUserAbortError || err instanceof Anthropic.APIConnectionTimeoutError) {
    return new ExtractionFailure("timeout", "Extraction request timed out", { cause: err });
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new ExtractionFailure("unreachable", `Extraction backend unreachable: ${err.message}`, {
      cause: err,
    });
  }
  return new ExtractionFailure("backend_error", `Extraction failed: ${errorMessage(err)}`, {
    cause: err,
  });
}
