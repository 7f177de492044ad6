/**
 * Notification sink: emails the intake summary to the dealing representative
 * through the Resend REST API, with the rendered form attached when present.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { SinkFailure, errorMessage } from "../errors.js";
import { isPlainObject } from "../kyc/coerce.js";
import type { KycRecord } from "../kyc/schema.js";
import type { ExemptionCategory, ValidationResult } from "../kyc/validator.js";
import type { Ack, DocumentHandle, NotificationSink, SinkContext } from "./types.js";

const RESEND_ENDPOINT = "https://api.resend.com/emails";

export interface NotificationEmail {
  subject: string;
  html: string;
  text: string;
}

// ---------------------------------------------------------------------------
// Message body
// ---------------------------------------------------------------------------

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function fullName(record: KycRecord): string {
  const { first, last } = record.client_name;
  return [first, last].filter(Boolean).join(" ") || "Unknown client";
}

function money(value: number | null): string {
  return value === null ? "N/A" : `$${value.toLocaleString("en-US", { maximumFractionDigits: 2 })}`;
}

const BADGE_COLOURS: Record<ExemptionCategory, string> = {
  ACCREDITED: "#28a745",
  ELIGIBLE: "#17a2b8",
  NON_ELIGIBLE: "#6c757d",
};

function listSection(title: string, colour: string, items: string[]): string {
  if (items.length === 0) return "";
  const lis = items.map((item) => `<li>${escapeHtml(item)}</li>`).join("");
  return (
    `<div style="border-left: 4px solid ${colour}; padding: 12px; margin: 16px 0;">` +
    `<h3 style="color: ${colour}; margin-top: 0;">${title}</h3><ul>${lis}</ul></div>`
  );
}

function textSection(title: string, items: string[]): string[] {
  if (items.length === 0) return [];
  return ["", `${title}:`, ...items.map((item) => `- ${item}`)];
}

export function buildNotificationEmail(
  record: KycRecord,
  validation: ValidationResult,
  document: DocumentHandle | null
): NotificationEmail {
  const name = fullName(record);
  const redFlags = validation.messages
    .filter((m) => m.severity === "red_flag")
    .map((m) => `${m.kind}: ${m.message}`);
  const concerns = validation.messages
    .filter((m) => m.severity === "suitability")
    .map((m) => `${m.kind}: ${m.message}`);
  const warnings = validation.messages
    .filter((m) => m.severity === "warning")
    .map((m) => `${m.kind}: ${m.message}`);

  const subject =
    (redFlags.length > 0 ? "[RED FLAGS] " : "") + `KYC Extraction Complete: ${name}`;

  const f = record.financials;
  const summaryRows: Array<[string, string]> = [
    ["Exemption", validation.category],
    ["Basis", validation.exemption.accreditation_reason],
    ["Annual income", money(f.annual_income)],
    ["Net financial assets", money(f.net_financial_assets)],
    ["Net worth", money(f.net_worth)],
    ["Risk tolerance", record.investment_profile.risk_tolerance ?? "N/A"],
    ["Time horizon", record.investment_profile.time_horizon ?? "N/A"],
  ];

  const html = [
    `<!DOCTYPE html><html><head><meta charset="UTF-8"></head>`,
    `<body style="font-family: Helvetica, Arial, sans-serif; max-width: 800px; margin: 0 auto;">`,
    `<h1>KYC Extraction: ${escapeHtml(name)}</h1>`,
    `<p><span style="background: ${BADGE_COLOURS[validation.category]}; color: white; ` +
      `padding: 4px 12px; border-radius: 12px; font-weight: bold;">` +
      `${validation.category}</span></p>`,
    `<table>`,
    ...summaryRows.map(
      ([label, value]) => `<tr><th align="left">${label}</th><td>${escapeHtml(value)}</td></tr>`
    ),
    `</table>`,
    listSection("Red Flags - Action Required", "#dc3545", redFlags),
    listSection("Suitability Concerns", "#fd7e14", concerns),
    listSection("Warnings", "#856404", warnings),
    listSection("Missing Fields", "#6c757d", validation.missing_required),
    listSection("Suggested Follow-up Questions", "#17a2b8", record.follow_up_questions),
    document ? `<p>Filled form attached: ${escapeHtml(path.basename(document.path))}</p>` : "",
    `</body></html>`,
  ].join("");

  const text = [
    `KYC Extraction: ${name}`,
    ...summaryRows.map(([label, value]) => `${label}: ${value}`),
    ...textSection("Red flags", redFlags),
    ...textSection("Suitability concerns", concerns),
    ...textSection("Warnings", warnings),
    ...textSection("Missing fields", validation.missing_required),
    ...textSection("Follow-up questions", record.follow_up_questions),
  ].join("\n");

  return { subject, html, text };
}

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

export interface ResendEmailNotifierOptions {
  apiKey: string;
  from: string;
  to: string[];
  fetch?: typeof fetch;
  now?: () => Date;
}

export class ResendEmailNotifier implements NotificationSink {
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly options: ResendEmailNotifierOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async notify(
    record: KycRecord,
    validation: ValidationResult,
    document: DocumentHandle | null,
    context: SinkContext
  ): Promise<Ack> {
    const email = buildNotificationEmail(record, validation, document);

    const attachments: Array<{ filename: string; content: string }> = [];
    if (document) {
      try {
        const bytes = await readFile(document.path);
        attachments.push({
          filename: path.basename(document.path),
          content: bytes.toString("base64"),
        });
      } catch (err) {
        context.logger.warn(
          { path: document.path, err: errorMessage(err) },
          "rendered form unreadable; sending without attachment"
        );
      }
    }

    let res: Response;
    try {
      res = await this.fetchImpl(RESEND_ENDPOINT, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify({
          from: this.options.from,
          to: this.options.to,
          subject: email.subject,
          html: email.html,
          text: email.text,
          ...(attachments.length > 0 ? { attachments } : {}),
        }),
      });
    } catch (err) {
      throw new SinkFailure("notification", `Email send failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new SinkFailure("notification", `Resend failed: ${res.status} ${body}`.trim());
    }

    const payload: unknown = await res.json().catch(() => null);
    return {
      id: isPlainObject(payload) && typeof payload.id === "string" ? payload.id : null,
      recipients: [...this.options.to],
      sent_at: this.now().toISOString(),
    };
  }
}
