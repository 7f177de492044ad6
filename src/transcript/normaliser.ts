/**
 * Normalises the transcript formats a call recorder delivers to plain text.
 * Supports: plain text, Whisper-style JSON, and base64-encoded docx.
 */

import { IntakeRejected } from "../errors.js";

export const TRANSCRIPT_FORMATS = ["txt", "whisper_json", "docx_base64"] as const;
export type TranscriptFormat = (typeof TRANSCRIPT_FORMATS)[number];

/** Shorter transcripts cannot hold a KYC conversation and are rejected at intake. */
export const MIN_TRANSCRIPT_LENGTH = 50;

/**
 * Normalise a transcript from any supported format to plain text.
 * Throws IntakeRejected if the content cannot be read in the declared format.
 */
export async function normaliseTranscript(
  content: string,
  format: TranscriptFormat = "txt"
): Promise<string> {
  switch (format) {
    case "txt":
      return content.trim();

    case "whisper_json":
      return normaliseWhisperJson(content);

    case "docx_base64":
      return normaliseDocxBase64(content);

    default: {
      const _never: never = format;
      throw new IntakeRejected(`Unknown transcript format: ${String(_never)}`);
    }
  }
}

/** Normalise and enforce the minimum length for a KYC intake run. */
export async function prepareTranscript(
  content: string,
  format: TranscriptFormat = "txt"
): Promise<string> {
  const text = await normaliseTranscript(content, format);
  if (text.length < MIN_TRANSCRIPT_LENGTH) {
    throw new IntakeRejected(
      `Transcript too short (${text.length} chars). Minimum is ${MIN_TRANSCRIPT_LENGTH}.`
    );
  }
  return text;
}

// ---------------------------------------------------------------------------
// Format-specific handlers
// ---------------------------------------------------------------------------

function normaliseWhisperJson(content: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new IntakeRejected("whisper_json: content is not valid JSON");
  }

  if (typeof parsed !== "object" || parsed === null) {
    throw new IntakeRejected("whisper_json: expected a JSON object or array");
  }

  // Case 1: top-level { text: "..." }
  if (!Array.isArray(parsed) && "text" in parsed && typeof parsed.text === "string") {
    const text = parsed.text.trim();
    if (text) return text;
  }

  // Case 2: segments array (direct array or nested under .segments)
  const segments: unknown[] = Array.isArray(parsed)
    ? parsed
    : "segments" in parsed && Array.isArray(parsed.segments)
      ? parsed.segments
      : [];

  if (segments.length === 0) {
    throw new IntakeRejected(
      "whisper_json: expected a top-level 'text' field or a non-empty 'segments' array"
    );
  }

  // Diarised recorders label each segment; keep the label so the model can
  // tell the client from the dealing representative.
  const lines: string[] = [];
  let labelled = false;
  for (const segment of segments) {
    if (typeof segment !== "object" || segment === null) continue;
    const text =
      "text" in segment && typeof segment.text === "string" ? segment.text.trim() : "";
    if (!text) continue;
    const speaker =
      "speaker" in segment && typeof segment.speaker === "string" ? segment.speaker.trim() : "";
    if (speaker) labelled = true;
    lines.push(speaker ? `${speaker}: ${text}` : text);
  }

  if (lines.length === 0) {
    throw new IntakeRejected("whisper_json: all segments have empty text");
  }

  return lines.join(labelled ? "\n" : " ");
}

const SELF_INTRODUCTION =
  /(?:[Mm]y name is|[Мм]еня зовут|[Мм]ене звати)\s+(\p{Lu}[\p{L}'-]*(?:[ \t]+\p{Lu}[\p{L}'-]*){0,2})/u;

/**
 * The name a speaker introduces themselves with ("My name is Ivan Petrenko"),
 * or null. A cheap first guess for the intake receipt; the record's name
 * comes from extraction.
 */
export function introducedName(transcript: string): string | null {
  const name = SELF_INTRODUCTION.exec(transcript)?.[1];
  return name ? name.replace(/[ \t]+/g, " ") : null;
}

async function normaliseDocxBase64(content: string): Promise<string> {
  if (!/^[A-Za-z0-9+/\s]+=*\s*$/.test(content)) {
    throw new IntakeRejected("docx_base64: content does not appear to be valid base64");
  }

  const buffer = Buffer.from(content.replace(/\s/g, ""), "base64");

  // Dynamic import so that mammoth is only loaded when actually needed
  const mammoth = await import("mammoth");
  let result: Awaited<ReturnType<typeof mammoth.default.extractRawText>>;
  try {
    result = await mammoth.default.extractRawText({ buffer });
  } catch (err) {
    throw new IntakeRejected(
      `docx_base64: could not read document (${err instanceof Error ? err.message : String(err)})`
    );
  }

  const errors = result.messages.filter((m) => m.type === "error");
  if (errors.length > 0) {
    throw new IntakeRejected(
      `docx_base64: extraction errors: ${errors.map((e) => e.message).join("; ")}`
    );
  }

  const text = result.value.trim();
  if (!text) {
    throw new IntakeRejected("docx_base64: extracted document has no text content");
  }

  return text;
}
