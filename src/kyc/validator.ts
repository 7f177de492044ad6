/**
 * Regulatory validation engine (NI 45-106 exemption tiers, AML and
 * suitability flags).
 *
 * `validate` is a pure function of the record and its options: it never
 * mutates the record and the same input always yields the same result. A null
 * figure never satisfies a threshold.
 */

import {
  REQUIRED_FIELDS,
  type ExemptionStatus,
  type FormType,
  type KycRecord,
} from "./schema.js";

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export type ExemptionCategory = "ACCREDITED" | "ELIGIBLE" | "NON_ELIGIBLE";

export const RED_FLAG_KINDS = [
  "PEP",
  "HIO",
  "HIGH_CONCENTRATION",
  "BORROWED_TO_INVEST",
  "RISK_MISMATCH",
  "AGE_RISK_CONCERN",
] as const;
export type RedFlagKind = (typeof RED_FLAG_KINDS)[number];

export const WARNING_KINDS = [
  "INSUFFICIENT_DATA_FOR_CLASSIFICATION",
  "ELIGIBLE_INVESTMENT_LIMIT",
  "MINIMUM_AMOUNT_EXEMPTION_CAP",
  "INCONSISTENT_TOTALS",
  "INVESTMENT_CONCENTRATION",
  "NFA_VERIFICATION_REQUIRED",
  "OBJECTIVE_RISK_MISALIGNMENT",
] as const;
export type WarningKind = (typeof WARNING_KINDS)[number];

/** Profile combinations a reviewer must confirm with the client. */
export const SUITABILITY_CONCERN_KINDS = [
  "RETIREMENT_HORIZON_MISMATCH",
  "GROWTH_WITH_LOW_TOLERANCE",
  "ELDERLY_HIGH_TOLERANCE",
  "ELDERLY_LONG_HORIZON",
  "HIGH_INVESTMENT_CONCENTRATION",
] as const;
export type SuitabilityConcernKind = (typeof SUITABILITY_CONCERN_KINDS)[number];

export type FlagKind = RedFlagKind | WarningKind | SuitabilityConcernKind;

export type FlagSeverity = "red_flag" | "suitability" | "warning";

export interface FlagMessage<K extends FlagKind = FlagKind> {
  kind: K;
  severity: FlagSeverity;
  message: string;
}

/**
 * COMPLETE: every figure the thresholds look at was present.
 * PARTIAL: some were null and were treated as not meeting their threshold.
 */
export type ClassificationBasis = "COMPLETE" | "PARTIAL";

export interface ValidationResult {
  category: ExemptionCategory;
  exemption: ExemptionStatus;
  classification_basis: ClassificationBasis;
  red_flags: RedFlagKind[];
  warnings: WarningKind[];
  suitability_concerns: SuitabilityConcernKind[];
  /** Human-readable detail for each flag: red flags, then concerns, then warnings. */
  messages: FlagMessage[];
  /** Required fields of the form type that are still null. */
  missing_required: string[];
  is_valid: boolean;
  follow_up_needed: boolean;
}

export interface ExemptionThresholds {
  accreditedIncomeSingle: number;
  accreditedIncomeJoint: number;
  accreditedFinancialAssets: number;
  accreditedNetAssets: number;
  eligibleIncomeSingle: number;
  eligibleIncomeJoint: number;
  eligibleNetAssets: number;
}

/** NI 45-106 thresholds, CAD. */
export const NI_45_106_THRESHOLDS: ExemptionThresholds = {
  accreditedIncomeSingle: 200_000,
  accreditedIncomeJoint: 300_000,
  accreditedFinancialAssets: 1_000_000,
  accreditedNetAssets: 5_000_000,
  eligibleIncomeSingle: 75_000,
  eligibleIncomeJoint: 125_000,
  eligibleNetAssets: 400_000,
};

export interface ValidateOptions {
  formType?: FormType;
  /** Date (YYYY-MM-DD) ages are computed at. Defaults to today. */
  asOf?: string;
  thresholds?: ExemptionThresholds;
  /** Share of net financial assets above which a holding is concentrated. */
  concentrationLimit?: number;
  /** Share of net financial assets above which the proposed investment is a suitability concern. */
  investmentConcernLimit?: number;
}

const MAX_MISSING_REQUIRED_FOR_VALID = 3;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function meets(value: number | null, threshold: number): boolean {
  return value !== null && value >= threshold;
}

function fmt(amount: number): string {
  return amount.toLocaleString("en-US", { maximumFractionDigits: 2 });
}

/** Sum of the non-null parts; null when every part is null. */
function jointIncome(record: KycRecord): number | null {
  const { annual_income, spouse_income } = record.financials;
  if (annual_income === null && spouse_income === null) return null;
  return (annual_income ?? 0) + (spouse_income ?? 0);
}

/** Net worth, falling back to total assets less liabilities. */
function netAssets(record: KycRecord): number | null {
  const { net_worth, total_assets, liabilities } = record.financials;
  if (net_worth !== null) return net_worth;
  if (total_assets !== null && liabilities !== null) return total_assets - liabilities;
  return null;
}

/** Whole years between an ISO birth date and `asOf`; null when unknown. */
export function ageOn(dob: string | null, asOf: string): number | null {
  if (!dob) return null;
  const birth = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dob);
  const ref = /^(\d{4})-(\d{2})-(\d{2})/.exec(asOf);
  if (!birth || !ref) return null;
  let age = Number(ref[1]) - Number(birth[1]);
  const beforeBirthday =
    Number(ref[2]) < Number(birth[2]) ||
    (Number(ref[2]) === Number(birth[2]) && Number(ref[3]) < Number(birth[3]));
  if (beforeBirthday) age -= 1;
  return age >= 0 ? age : null;
}

// ---------------------------------------------------------------------------
// Exemption classification
// ---------------------------------------------------------------------------

interface Classification {
  category: ExemptionCategory;
  exemption: ExemptionStatus;
}

function classify(record: KycRecord, t: ExemptionThresholds): Classification {
  const f = record.financials;
  const stable = f.income_stable_2_years === true;
  const joint = jointIncome(record);
  const net = netAssets(record);

  const accredited: string[] = [];
  if (stable && meets(f.annual_income, t.accreditedIncomeSingle)) {
    accredited.push(`annual_income >= ${fmt(t.accreditedIncomeSingle)} for 2 years`);
  }
  if (stable && meets(joint, t.accreditedIncomeJoint)) {
    accredited.push(
      `annual_income + spouse_income >= ${fmt(t.accreditedIncomeJoint)} for 2 years`
    );
  }
  if (meets(f.net_financial_assets, t.accreditedFinancialAssets)) {
    accredited.push(`net_financial_assets >= ${fmt(t.accreditedFinancialAssets)}`);
  }
  if (meets(net, t.accreditedNetAssets)) {
    accredited.push(`net_worth >= ${fmt(t.accreditedNetAssets)}`);
  }

  const eligible: string[] = [];
  if (meets(f.annual_income, t.eligibleIncomeSingle)) {
    eligible.push(`annual_income >= ${fmt(t.eligibleIncomeSingle)}`);
  }
  if (meets(joint, t.eligibleIncomeJoint)) {
    eligible.push(`annual_income + spouse_income >= ${fmt(t.eligibleIncomeJoint)}`);
  }
  if (meets(net, t.eligibleNetAssets)) {
    eligible.push(`net_worth >= ${fmt(t.eligibleNetAssets)}`);
  }

  const is_accredited = accredited.length > 0;
  const is_eligible = eligible.length > 0;

  if (is_accredited) {
    return {
      category: "ACCREDITED",
      exemption: { is_accredited, is_eligible, accreditation_reason: accredited.join("; ") },
    };
  }
  if (is_eligible) {
    return {
      category: "ELIGIBLE",
      exemption: { is_accredited, is_eligible, accreditation_reason: eligible.join("; ") },
    };
  }
  return {
    category: "NON_ELIGIBLE",
    exemption: {
      is_accredited,
      is_eligible,
      accreditation_reason: "no accredited or eligible investor threshold met",
    },
  };
}

const CLASSIFICATION_INPUTS = [
  "annual_income",
  "spouse_income",
  "net_financial_assets",
  "total_assets",
  "liabilities",
  "net_worth",
] as const;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Classify a record and collect its red flags, suitability concerns and warnings. */
export function validate(record: KycRecord, options: ValidateOptions = {}): ValidationResult {
  const formType = options.formType ?? "individual";
  const asOf = options.asOf ?? new Date().toISOString().slice(0, 10);
  const thresholds = options.thresholds ?? NI_45_106_THRESHOLDS;
  const concentrationLimit = options.concentrationLimit ?? 0.1;
  const investmentConcernLimit = options.investmentConcernLimit ?? 0.25;

  const f = record.financials;
  const profile = record.investment_profile;
  const age = ageOn(record.personal.dob, asOf);
  const nfa = f.net_financial_assets;

  const red: FlagMessage<RedFlagKind>[] = [];
  const concerns: FlagMessage<SuitabilityConcernKind>[] = [];
  const warn: FlagMessage<WarningKind>[] = [];
  const redFlag = (kind: RedFlagKind, message: string) =>
    red.push({ kind, severity: "red_flag", message });
  const concern = (kind: SuitabilityConcernKind, message: string) =>
    concerns.push({ kind, severity: "suitability", message });
  const warning = (kind: WarningKind, message: string) =>
    warn.push({ kind, severity: "warning", message });

  const { category, exemption } = classify(record, thresholds);

  // Red flags, in fixed order.
  if (record.aml.is_pep === true) {
    redFlag(
      "PEP",
      `Client is a politically exposed person: ${record.aml.pep_position ?? "position unknown"}`
    );
  }
  if (record.aml.is_hio === true) {
    redFlag("HIO", "Client is the head of an international organization; enhanced due diligence required");
  }
  if (record.holdings && record.holdings.length > 0 && nfa !== null && nfa > 0) {
    const concentrated = record.holdings.filter((h) => h.amount > nfa * concentrationLimit);
    if (concentrated.length > 0) {
      redFlag(
        "HIGH_CONCENTRATION",
        `Holding(s) above ${concentrationLimit * 100}% of net financial assets: ` +
          concentrated.map((h) => h.description).join(", ")
      );
    }
  }
  if (f.borrowed_to_invest === true) {
    redFlag("BORROWED_TO_INVEST", "Client is investing borrowed funds; leverage disclosure required");
  }
  if (
    profile.risk_tolerance === "HIGH" &&
    (profile.risk_capacity === "LOW" || profile.risk_capacity === "NIL")
  ) {
    redFlag(
      "RISK_MISMATCH",
      `Risk tolerance (${profile.risk_tolerance}) exceeds risk capacity (${profile.risk_capacity})`
    );
  }
  if (
    age !== null &&
    age >= 65 &&
    profile.risk_tolerance === "HIGH" &&
    (profile.time_horizon === "1-3" || profile.time_horizon === "3-5")
  ) {
    redFlag(
      "AGE_RISK_CONCERN",
      `Client is ${age} with HIGH risk tolerance and a ${profile.time_horizon} year horizon`
    );
  }

  // Suitability concerns, in fixed order.
  const retirementYear = profile.planned_retirement_year;
  if (retirementYear !== null && profile.time_horizon === "10+") {
    const yearsToRetirement = retirementYear - Number(asOf.slice(0, 4));
    if (yearsToRetirement < 5) {
      concern(
        "RETIREMENT_HORIZON_MISMATCH",
        `10+ year horizon but retirement is planned in ${yearsToRetirement} year(s)`
      );
    }
  }
  if (profile.investment_objective === "GROWTH" && profile.risk_tolerance === "LOW") {
    concern("GROWTH_WITH_LOW_TOLERANCE", "GROWTH objective with LOW risk tolerance");
  }
  if (age !== null && age >= 65 && profile.risk_tolerance === "HIGH") {
    concern("ELDERLY_HIGH_TOLERANCE", `Client is ${age} with HIGH risk tolerance`);
  }
  if (age !== null && age >= 70 && profile.time_horizon === "10+") {
    concern("ELDERLY_LONG_HORIZON", `Client is ${age} with a 10+ year time horizon`);
  }
  const amount = record.investment_details.amount;
  if (amount !== null && amount > 0 && nfa !== null && nfa > 0 && amount > nfa * investmentConcernLimit) {
    concern(
      "HIGH_INVESTMENT_CONCENTRATION",
      `Proposed investment is ${((amount / nfa) * 100).toFixed(1)}% of net financial assets`
    );
  }

  // Warnings, in fixed order.
  const absent = CLASSIFICATION_INPUTS.filter((key) => f[key] === null);
  if (absent.length > 0) {
    warning(
      "INSUFFICIENT_DATA_FOR_CLASSIFICATION",
      `Classified from partial data; missing: ${absent.map((k) => `financials.${k}`).join(", ")}`
    );
  }
  if (category === "ELIGIBLE" && record.address.province !== "BC") {
    warning(
      "ELIGIBLE_INVESTMENT_LIMIT",
      "Eligible investors outside BC are limited to $100,000 in a rolling 12-month period"
    );
  }
  if (category === "NON_ELIGIBLE") {
    warning(
      "MINIMUM_AMOUNT_EXEMPTION_CAP",
      "Investment is capped at $10,000 per issuer under the minimum amount exemption"
    );
  }
  if (record.adjustments.length > 0) {
    warning(
      "INCONSISTENT_TOTALS",
      "Recomputed from components: " +
        record.adjustments
          .map((a) => `${a.path} (stated ${fmt(a.provided)}, computed ${fmt(a.computed)})`)
          .join("; ")
    );
  }
  if (amount !== null && amount > 0 && nfa !== null && nfa > 0 && amount > nfa * concentrationLimit) {
    const pct = ((amount / nfa) * 100).toFixed(1);
    warning(
      "INVESTMENT_CONCENTRATION",
      `Proposed investment is ${pct}% of net financial assets; document the suitability rationale`
    );
  }
  if (nfa !== null && nfa >= thresholds.accreditedFinancialAssets) {
    warning(
      "NFA_VERIFICATION_REQUIRED",
      `Net financial assets of $${fmt(nfa)} require verification documentation`
    );
  }
  if (profile.investment_objective === "INCOME" && profile.risk_tolerance === "HIGH") {
    warning(
      "OBJECTIVE_RISK_MISALIGNMENT",
      "INCOME objective with HIGH risk tolerance; confirm the client understands the risk"
    );
  }

  const missing_required = REQUIRED_FIELDS[formType].filter((path) =>
    record.missing_fields.includes(path)
  );
  const red_flags = red.map((m) => m.kind);
  const warnings = warn.map((m) => m.kind);
  const suitability_concerns = concerns.map((m) => m.kind);

  return {
    category,
    exemption,
    classification_basis: absent.length > 0 ? "PARTIAL" : "COMPLETE",
    red_flags,
    warnings,
    suitability_concerns,
    messages: [...red, ...concerns, ...warn],
    missing_required,
    is_valid: red_flags.length === 0 && missing_required.length <= MAX_MISSING_REQUIRED_FOR_VALID,
    follow_up_needed:
      red_flags.length > 0 ||
      suitability_concerns.length > 0 ||
      missing_required.length > MAX_MISSING_REQUIRED_FOR_VALID,
  };
}

/** A copy of `record` carrying the exemption status derived by `validation`. */
export function withExemption(record: KycRecord, validation: ValidationResult): KycRecord {
  return { ...record, exemption_status: { ...validation.exemption } };
}
