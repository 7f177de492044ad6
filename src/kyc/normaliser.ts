/**
 * Extraction normaliser: untrusted backend JSON → canonical KycRecord.
 *
 * Walks the canonical schema field by field and coerces each value; anything
 * that fails coercion becomes null and is reported in `missing_fields`.
 * Forbidden fields are nulled regardless of input. Never throws.
 */

import {
  isPlainObject,
  isLatinName,
  coerceBoolean,
  coerceBoundedNumber,
  coerceEnum,
  coerceEnumSet,
  coerceInteger,
  coerceIsoDate,
  coerceMoney,
  coerceProvince,
  coerceStringList,
  coerceText,
} from "./coerce.js";
import {
  CONFIDENCE_LEVELS,
  FOLLOW_UP_PROMPTS,
  FORBIDDEN_FIELD_PATHS,
  INVESTMENT_OBJECTIVES,
  KNOWLEDGE_LEVELS,
  KYC_FIELD_TABLE,
  PRODUCT_TYPES,
  REQUIRED_FIELDS,
  RISK_CAPACITIES,
  RISK_TOLERANCES,
  SOURCES_OF_FUNDS,
  TIME_HORIZONS,
  type ConfidenceLevel,
  type ConfidenceScores,
  type FormType,
  type Holding,
  type KycRecord,
  type SourceLanguage,
  type TotalAdjustment,
} from "./schema.js";

export const DEFAULT_TOTALS_TOLERANCE = 0.01;

export interface NormaliseOptions {
  /** Decides which required fields get a follow-up question (default: individual). */
  formType?: FormType;
  /** Relative disagreement allowed between a provided total and its components. */
  totalsTolerance?: number;
  /** Reference date (YYYY-MM-DD) after which a date of birth is rejected. Defaults to today. */
  asOf?: string;
}

export interface NormalisationReport {
  /** Forbidden paths the backend returned a value for. All were discarded. */
  forbiddenFieldsPresent: string[];
  /** Paths where a value was present but could not be coerced. */
  rejectedValues: string[];
}

export interface NormalisationOutcome {
  record: KycRecord;
  report: NormalisationReport;
}

// ---------------------------------------------------------------------------
// Section reader
// ---------------------------------------------------------------------------

class SectionReader {
  private readonly source: Record<string, unknown>;

  constructor(
    raw: Record<string, unknown>,
    private readonly section: string,
    private readonly rejected: string[]
  ) {
    const value = raw[section];
    this.source = isPlainObject(value) ? value : {};
  }

  private take<T>(field: string, coerce: (value: unknown) => T | null): T | null {
    const value = this.source[field];
    const coerced = coerce(value);
    if (coerced === null && value !== null && value !== undefined && value !== "") {
      this.rejected.push(`${this.section}.${field}`);
    }
    return coerced;
  }

  text(field: string): string | null {
    return this.take(field, coerceText);
  }

  province(field: string): string | null {
    return this.take(field, coerceProvince);
  }

  date(field: string, notAfter?: string): string | null {
    return this.take(field, (v) => coerceIsoDate(v, notAfter));
  }

  integer(field: string): number | null {
    return this.take(field, coerceInteger);
  }

  number(field: string, bounds?: { min?: number; max?: number }): number | null {
    return this.take(field, (v) => coerceBoundedNumber(v, bounds));
  }

  money(field: string, signed = false): number | null {
    return this.take(field, (v) => coerceMoney(v, signed));
  }

  boolean(field: string): boolean | null {
    return this.take(field, coerceBoolean);
  }

  oneOf<T extends string>(field: string, values: readonly T[]): T | null {
    return this.take(field, (v) => coerceEnum(v, values));
  }

  setOf<T extends string>(field: string, values: readonly T[]): T[] | null {
    return this.take(field, (v) => coerceEnumSet(v, values));
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Normalise raw extraction output into a canonical record. */
export function normalize(
  raw: unknown,
  language: SourceLanguage,
  options: NormaliseOptions = {}
): KycRecord {
  return normalizeWithReport(raw, language, options).record;
}

/**
 * Normalise and also report what was discarded, so the caller can log
 * backend-trust signals (forbidden fields, uncoercible values).
 */
export function normalizeWithReport(
  raw: unknown,
  language: SourceLanguage,
  options: NormaliseOptions = {}
): NormalisationOutcome {
  const formType = options.formType ?? "individual";
  const tolerance = options.totalsTolerance ?? DEFAULT_TOTALS_TOLERANCE;
  const asOf = options.asOf ?? new Date().toISOString().slice(0, 10);

  const source = isPlainObject(raw) ? raw : {};
  const rejected: string[] = [];
  const read = (section: string) => new SectionReader(source, section, rejected);

  const clientName = read("client_name");
  const spouseName = read("spouse_name");
  const address = read("address");
  const contact = read("contact");
  const personal = read("personal");
  const employment = read("employment");
  const spouseEmployment = read("spouse_employment");
  const financials = read("financials");
  const composition = read("asset_composition");
  const profile = read("investment_profile");
  const investment = read("investment_details");
  const corporate = read("corporate_info");
  const aml = read("aml");

  const record: KycRecord = {
    client_name: {
      first: clientName.text("first"),
      middle: clientName.text("middle"),
      last: clientName.text("last"),
    },
    spouse_name: {
      first: spouseName.text("first"),
      last: spouseName.text("last"),
    },
    address: {
      street: address.text("street"),
      unit: address.text("unit"),
      city: address.text("city"),
      province: address.province("province"),
      postal_code: address.text("postal_code"),
    },
    contact: {
      phone: contact.text("phone"),
      cell: contact.text("cell"),
      email: contact.text("email"),
    },
    personal: {
      dob: personal.date("dob", asOf),
      citizenship: personal.text("citizenship"),
      dependents: personal.integer("dependents"),
      marital_status: personal.text("marital_status"),
    },
    employment: {
      occupation: employment.text("occupation"),
      employer: employment.text("employer"),
      years_employed: employment.number("years_employed", { min: 0 }),
      is_self_employed: employment.boolean("is_self_employed"),
    },
    spouse_employment: {
      occupation: spouseEmployment.text("occupation"),
      employer: spouseEmployment.text("employer"),
    },
    financials: {
      annual_income: financials.money("annual_income"),
      spouse_income: financials.money("spouse_income"),
      other_income: financials.money("other_income"),
      total_income: financials.money("total_income"),
      net_financial_assets: financials.money("net_financial_assets"),
      non_financial_assets: financials.money("non_financial_assets"),
      total_assets: financials.money("total_assets"),
      liabilities: financials.money("liabilities"),
      net_worth: financials.money("net_worth", true),
      income_stable_2_years: financials.boolean("income_stable_2_years"),
      borrowed_to_invest: financials.boolean("borrowed_to_invest"),
    },
    asset_composition: {
      cash_pct: composition.number("cash_pct", { min: 0, max: 100 }),
      stocks_pct: composition.number("stocks_pct", { min: 0, max: 100 }),
      bonds_pct: composition.number("bonds_pct", { min: 0, max: 100 }),
      real_estate_pct: composition.number("real_estate_pct", { min: 0, max: 100 }),
      other_pct: composition.number("other_pct", { min: 0, max: 100 }),
    },
    investment_profile: {
      knowledge_level: profile.oneOf("knowledge_level", KNOWLEDGE_LEVELS),
      risk_tolerance: profile.oneOf("risk_tolerance", RISK_TOLERANCES),
      risk_capacity: profile.oneOf("risk_capacity", RISK_CAPACITIES),
      time_horizon: profile.oneOf("time_horizon", TIME_HORIZONS),
      investment_objective: profile.oneOf("investment_objective", INVESTMENT_OBJECTIVES),
      planned_retirement_year: profile.integer("planned_retirement_year"),
      products_owned: profile.setOf("products_owned", PRODUCT_TYPES),
    },
    investment_details: {
      issuer: investment.text("issuer"),
      amount: investment.money("amount"),
      source_of_funds: investment.oneOf("source_of_funds", SOURCES_OF_FUNDS),
    },
    corporate_info: {
      legal_name: corporate.text("legal_name"),
      cra_business_number: corporate.text("cra_business_number"),
      industry_type: corporate.text("industry_type"),
      province_of_incorporation: corporate.province("province_of_incorporation"),
      date_of_incorporation: corporate.date("date_of_incorporation", asOf),
    },
    holdings: coerceHoldings(source.holdings),
    exemption_status: null,
    aml: {
      is_pep: aml.boolean("is_pep"),
      pep_position: aml.text("pep_position"),
      is_hio: aml.boolean("is_hio"),
    },
    sin: null,
    bank_account: null,
    confidence_scores: coerceConfidence(source.confidence_scores),
    adjustments: [],
    missing_fields: [],
    ambiguous_items: coerceStringList(source.ambiguous_items),
    follow_up_questions: [],
  };

  reconcileTotals(record, tolerance);
  applyConfidenceRules(record, language);

  record.missing_fields = missingFieldPaths(record);
  record.follow_up_questions = followUpQuestions(
    coerceStringList(source.follow_up_questions),
    record.missing_fields,
    formType
  );

  return {
    record,
    report: {
      forbiddenFieldsPresent: findForbiddenFields(source),
      rejectedValues: rejected,
    },
  };
}

/**
 * Canonical paths of every field that is null in `record`, in schema order.
 * Which of them a form type requires is REQUIRED_FIELDS' concern.
 */
export function missingFieldPaths(record: KycRecord): string[] {
  const missing: string[] = [];
  for (const group of KYC_FIELD_TABLE) {
    const section: unknown = record[group.section];
    for (const field of group.fields) {
      const value = isPlainObject(section) ? section[field.name] : undefined;
      if (value === null || value === undefined) {
        missing.push(`${group.section}.${field.name}`);
      }
    }
  }
  return missing;
}

// ---------------------------------------------------------------------------
// Totals
// ---------------------------------------------------------------------------

function round2(value: number): number {
  const cents = value * 100;
  return Number.isFinite(cents) ? Math.round(cents) / 100 : value;
}

function agrees(provided: number, computed: number, tolerance: number): boolean {
  const scale = Math.max(Math.abs(provided), Math.abs(computed));
  return Math.abs(provided - computed) <= tolerance * scale;
}

/**
 * Decide between a provided total and the value computed from its components.
 * With no components present the provided total stands.
 */
function reconcile(
  path: string,
  provided: number | null,
  computed: number | null,
  tolerance: number,
  adjustments: TotalAdjustment[]
): number | null {
  if (computed === null) return provided;
  if (provided === null) return computed;
  if (agrees(provided, computed, tolerance)) return provided;
  adjustments.push({ path, provided, computed });
  return computed;
}

/** Sum of the non-null values; null when none is present or the sum overflows. */
function sumPresent(values: Array<number | null>): number | null {
  const present = values.filter((v): v is number => v !== null);
  if (present.length === 0) return null;
  const sum = round2(present.reduce((a, b) => a + b, 0));
  return Number.isFinite(sum) ? sum : null;
}

function reconcileTotals(record: KycRecord, tolerance: number): void {
  const f = record.financials;
  const adjustments = record.adjustments;

  f.total_income = reconcile(
    "financials.total_income",
    f.total_income,
    sumPresent([f.annual_income, f.spouse_income, f.other_income]),
    tolerance,
    adjustments
  );

  f.total_assets = reconcile(
    "financials.total_assets",
    f.total_assets,
    sumPresent([f.net_financial_assets, f.non_financial_assets]),
    tolerance,
    adjustments
  );

  f.net_worth = reconcile(
    "financials.net_worth",
    f.net_worth,
    f.total_assets !== null && f.liabilities !== null
      ? round2(f.total_assets - f.liabilities)
      : null,
    tolerance,
    adjustments
  );
}

// ---------------------------------------------------------------------------
// Confidence
// ---------------------------------------------------------------------------

function coerceConfidence(value: unknown): ConfidenceScores {
  const source = isPlainObject(value) ? value : {};
  const level = (key: string): ConfidenceLevel =>
    coerceEnum(source[key], CONFIDENCE_LEVELS) ?? "LOW";
  return {
    client_name: level("client_name"),
    financials: level("financials"),
    risk_profile: level("risk_profile"),
  };
}

function applyConfidenceRules(record: KycRecord, language: SourceLanguage): void {
  // Transliteration is the backend's job; a Cyrillic name means it did not happen.
  if (language !== "en") {
    const names = [
      record.client_name.first,
      record.client_name.middle,
      record.client_name.last,
      record.spouse_name.first,
      record.spouse_name.last,
    ].filter((n): n is string => n !== null);
    if (names.some((n) => !isLatinName(n))) {
      record.confidence_scores.client_name = "LOW";
    }
  }

  if (record.adjustments.length > 0 && record.confidence_scores.financials === "HIGH") {
    record.confidence_scores.financials = "MEDIUM";
  }
}

// ---------------------------------------------------------------------------
// Holdings, follow-ups, forbidden fields
// ---------------------------------------------------------------------------

function coerceHoldings(value: unknown): Holding[] | null {
  if (!Array.isArray(value)) return null;
  const holdings: Holding[] = [];
  for (const item of value) {
    if (!isPlainObject(item)) continue;
    const description = coerceText(item.description);
    const amount = coerceMoney(item.amount);
    if (description !== null && amount !== null) holdings.push({ description, amount });
  }
  return value.length > 0 && holdings.length === 0 ? null : holdings;
}

function followUpQuestions(
  fromBackend: string[],
  missing: string[],
  formType: FormType
): string[] {
  const questions = [...fromBackend];
  for (const path of REQUIRED_FIELDS[formType]) {
    const prompt = FOLLOW_UP_PROMPTS[path];
    if (prompt && missing.includes(path) && !questions.includes(prompt)) {
      questions.push(prompt);
    }
  }
  return questions;
}

function valueAtPath(source: Record<string, unknown>, path: string): unknown {
  let current: unknown = source;
  for (const key of path.split(".")) {
    if (!isPlainObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

function findForbiddenFields(source: Record<string, unknown>): string[] {
  return FORBIDDEN_FIELD_PATHS.filter((path) => {
    const value = valueAtPath(source, path);
    return value !== null && value !== undefined && value !== "";
  });
}
