/**
 * Rendering sink: fills the dealer's AcroForm KYC templates with pdf-lib.
 *
 * Each form type has a field map from PDF field name to record value. Text
 * fields take strings, check boxes take booleans. Names the template does not
 * carry are reported on the DocumentHandle instead of failing the render.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { PDFCheckBox, PDFDocument, PDFTextField } from "pdf-lib";
import { SinkFailure, errorMessage } from "../errors.js";
import type { FormType, KycRecord } from "../kyc/schema.js";
import type { DocumentHandle, RenderSink, SinkContext } from "./types.js";

export type FieldValue = string | number | boolean | null;
export type FieldMap = Record<string, FieldValue>;

export const FORM_TEMPLATES: Record<FormType, string> = {
  individual: "kyc-individual.pdf",
  corporate: "kyc-corporate.pdf",
  trade_suitability: "trade-suitability.pdf",
};

interface MapContext {
  date: string;
  dealingRep: string;
}

// ---------------------------------------------------------------------------
// Field maps
// ---------------------------------------------------------------------------

function joinPresent(parts: Array<string | null>, separator: string): string {
  return parts.filter((p): p is string => Boolean(p)).join(separator);
}

function individualFields(record: KycRecord, ctx: MapContext): FieldMap {
  const { client_name: name, address, contact, personal, employment, financials: f } = record;
  const profile = record.investment_profile;
  const composition = record.asset_composition;

  return {
    Date: ctx.date,
    "Dealing Representative": ctx.dealingRep,

    "Full Name": joinPresent([name.last, name.first, name.middle], " "),
    Last: name.last,
    First: name.first,
    Middle: name.middle,
    "Street Address cannot be a PO Box": address.street,
    ApartmentUnit: address.unit,
    City: address.city,
    Prov: address.province,
    "Postal Code": address.postal_code,
    "Phone day": contact.phone,
    Cell: contact.cell,
    Email: contact.email,
    "Date of Birth": personal.dob,
    // Collected manually by the dealing representative.
    SIN: "",
    Dependents: personal.dependents,
    "Primary Occupation": employment.occupation,
    Employer: employment.employer,

    Good: profile.knowledge_level === "GOOD",
    Average: profile.knowledge_level === "AVERAGE",
    Limited: profile.knowledge_level === "LIMITED",

    LOW: profile.risk_tolerance === "LOW",
    MODERATE: profile.risk_tolerance === "MODERATE",
    HIGH: profile.risk_tolerance === "HIGH",

    Growth: profile.investment_objective === "GROWTH",
    "Growth  Income": profile.investment_objective === "GROWTH_AND_INCOME",
    Income: profile.investment_objective === "INCOME",
    "Tax Efficiency": profile.investment_objective === "TAX_EFFICIENCY",

    "13 years": profile.time_horizon === "1-3",
    "35 years": profile.time_horizon === "3-5",
    "610 years": profile.time_horizon === "6-10",
    "10 years": profile.time_horizon === "10+",

    "Employment Annual Income": f.annual_income,
    "SpousePartner Annual Income": f.spouse_income,
    "Other Income": f.other_income,
    "Total Income": f.total_income,
    "Estimated Net Financial Assets": f.net_financial_assets,
    "Estimated NonFinancial Assets": f.non_financial_assets,
    "Estimated Total Assets": f.total_assets,
    "Estimated Liabilities": f.liabilities,
    "Estimated Net Worth": f.net_worth,

    "Cash  Deposits": composition.cash_pct,
    "Public Equities  Stocks": composition.stocks_pct,
    "Fixed Income  Bonds": composition.bonds_pct,

    "PEP Yes": record.aml.is_pep === true,
    "PEP No": record.aml.is_pep === false,
    "HIO Yes": record.aml.is_hio === true,
    "HIO No": record.aml.is_hio === false,
  };
}

function corporateFields(record: KycRecord, ctx: MapContext): FieldMap {
  const corp = record.corporate_info;
  return {
    Date: ctx.date,
    "Dealing Representative": ctx.dealingRep,
    Name: corp.legal_name,
    "Legal Address": record.address.street,
    City: record.address.city,
    Prov: record.address.province,
    "Postal Code": record.address.postal_code,
    "CRA Business Number": corp.cra_business_number,
    "Industry and Business Type": corp.industry_type,
    "Province of IncorpReg": corp.province_of_incorporation,
    "Date of IncorpReg": corp.date_of_incorporation,
    "Person 1": joinPresent([record.client_name.first, record.client_name.last], " "),
    "Estimated annual income from all sources": record.financials.annual_income,
    "Net Assets of corporation": record.financials.net_worth,
  };
}

function tradeSuitabilityFields(record: KycRecord, ctx: MapContext): FieldMap {
  const trade = record.investment_details;
  return {
    Date: ctx.date,
    "Dealing Representative": ctx.dealingRep,
    Client: joinPresent([record.client_name.first, record.client_name.last], " "),
    Nonregd: trade.source_of_funds === "NON_REGISTERED",
    RRSP: trade.source_of_funds === "RRSP",
    TFSA: trade.source_of_funds === "TFSA",
    Borrowed: trade.source_of_funds === "BORROWED",
    Other: trade.source_of_funds === "OTHER",
    "Issuer 1": trade.issuer,
    "Amount 1": trade.amount,
  };
}

/** PDF field values for a record, keyed by template field name. */
export function mapFormFields(
  record: KycRecord,
  formType: FormType,
  ctx: MapContext
): FieldMap {
  switch (formType) {
    case "individual":
      return individualFields(record, ctx);
    case "corporate":
      return corporateFields(record, ctx);
    case "trade_suitability":
      return tradeSuitabilityFields(record, ctx);
    default: {
      const _never: never = formType;
      throw new SinkFailure("rendering", `Unknown form type: ${String(_never)}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Filling
// ---------------------------------------------------------------------------

export interface FilledForm {
  pdfBytes: Uint8Array;
  filled: number;
  missingFields: string[];
}

function asText(value: FieldValue): string {
  if (value === null) return "";
  if (typeof value === "boolean") return value ? "Yes" : "No";
  return String(value);
}

/** Write field values into an AcroForm. */
export async function fillPdfFormFields(
  pdfBytes: Uint8Array,
  fieldValues: FieldMap
): Promise<FilledForm> {
  const pdfDoc = await PDFDocument.load(pdfBytes);
  const form = pdfDoc.getForm();

  const missingFields: string[] = [];
  let filled = 0;

  for (const [fieldName, value] of Object.entries(fieldValues)) {
    const field = form.getFieldMaybe(fieldName);
    if (field instanceof PDFTextField) {
      field.setText(asText(value));
      if (value !== null && value !== "") filled += 1;
    } else if (field instanceof PDFCheckBox) {
      if (value === true) {
        field.check();
        filled += 1;
      } else {
        field.uncheck();
      }
    } else {
      missingFields.push(fieldName);
    }
  }

  return { pdfBytes: await pdfDoc.save(), filled, missingFields };
}

/** `<FORM>_KYC_<First>_<Last>_<YYYYMMDD_HHMMSS>.pdf`, UTC. */
export function outputFileName(record: KycRecord, formType: FormType, at: Date): string {
  const safe = (part: string) => part.replace(/[^\p{L}\p{N}-]+/gu, "_");
  const first = safe(record.client_name.first ?? "Unknown");
  const last = safe(record.client_name.last ?? "Client");
  const stamp = at
    .toISOString()
    .replace(/\.\d{3}Z$/, "")
    .replace(/-|:/g, "")
    .replace("T", "_");
  return `${formType.toUpperCase()}_KYC_${first}_${last}_${stamp}.pdf`;
}

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

export interface PdfFormRendererOptions {
  templatesDir: string;
  outputDir: string;
  /** Used when the run does not name a representative. */
  dealingRep?: string;
  now?: () => Date;
}

export class PdfFormRenderer implements RenderSink {
  private readonly now: () => Date;

  constructor(private readonly options: PdfFormRendererOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async render(
    record: KycRecord,
    formType: FormType,
    context: SinkContext
  ): Promise<DocumentHandle> {
    const templatePath = path.join(this.options.templatesDir, FORM_TEMPLATES[formType]);

    let template: Uint8Array;
    try {
      template = await readFile(templatePath);
    } catch (err) {
      throw new SinkFailure("rendering", `Template not found: ${templatePath}`, { cause: err });
    }

    const fields = mapFormFields(record, formType, {
      date: context.asOf,
      dealingRep: context.dealingRep ?? this.options.dealingRep ?? "",
    });

    let result: FilledForm;
    try {
      result = await fillPdfFormFields(template, fields);
    } catch (err) {
      throw new SinkFailure("rendering", `Could not fill ${templatePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const outputPath = path.join(
      this.options.outputDir,
      outputFileName(record, formType, this.now())
    );
    try {
      await mkdir(this.options.outputDir, { recursive: true });
      await writeFile(outputPath, result.pdfBytes);
    } catch (err) {
      throw new SinkFailure("rendering", `Could not write ${outputPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (result.missingFields.length > 0) {
      context.logger.debug(
        { template: templatePath, missing: result.missingFields },
        "template lacks mapped fields"
      );
    }

    return {
      path: outputPath,
      form_type: formType,
      fields_filled: result.filled,
      fields_missing: result.missingFields,
    };
  }
}
