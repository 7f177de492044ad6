/**
 * Canonical KYC record shape and field-trust model.
 *
 * Field names are snake_case: they are the extraction backend's wire format
 * and the dotted paths reported in `missing_fields` (e.g. "personal.dob").
 * KYC_FIELD_TABLE lists every extractable field in schema order. The
 * extraction tool schema and the missing-field walk are built from it; each
 * field's coercion is written out in the normaliser.
 */

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const SOURCE_LANGUAGES = ["ru", "uk", "en", "auto"] as const;
export type SourceLanguage = (typeof SOURCE_LANGUAGES)[number];

export const FORM_TYPES = ["individual", "corporate", "trade_suitability"] as const;
export type FormType = (typeof FORM_TYPES)[number];

export const KNOWLEDGE_LEVELS = ["GOOD", "AVERAGE", "LIMITED"] as const;
export type KnowledgeLevel = (typeof KNOWLEDGE_LEVELS)[number];

export const RISK_TOLERANCES = ["LOW", "MODERATE", "HIGH"] as const;
export type RiskTolerance = (typeof RISK_TOLERANCES)[number];

export const RISK_CAPACITIES = ["HIGH", "MEDIUM", "LOW", "NIL"] as const;
export type RiskCapacity = (typeof RISK_CAPACITIES)[number];

export const TIME_HORIZONS = ["1-3", "3-5", "6-10", "10+"] as const;
export type TimeHorizon = (typeof TIME_HORIZONS)[number];

export const INVESTMENT_OBJECTIVES = [
  "GROWTH",
  "GROWTH_AND_INCOME",
  "INCOME",
  "TAX_EFFICIENCY",
] as const;
export type InvestmentObjective = (typeof INVESTMENT_OBJECTIVES)[number];

export const PRODUCT_TYPES = [
  "STOCKS",
  "BONDS",
  "MUTUAL_FUNDS",
  "ETFS",
  "CRYPTO",
  "REAL_ESTATE",
  "MICS",
  "LIMITED_PARTNERSHIPS",
  "EXEMPT_SECURITIES",
] as const;
export type ProductType = (typeof PRODUCT_TYPES)[number];

export const SOURCES_OF_FUNDS = [
  "NON_REGISTERED",
  "RRSP",
  "TFSA",
  "BORROWED",
  "OTHER",
] as const;
export type SourceOfFunds = (typeof SOURCES_OF_FUNDS)[number];

export const CONFIDENCE_LEVELS = ["HIGH", "MEDIUM", "LOW"] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

// ---------------------------------------------------------------------------
// Record sections
// ---------------------------------------------------------------------------

export interface ClientName {
  first: string | null;
  middle: string | null;
  last: string | null;
}

export interface SpouseName {
  first: string | null;
  last: string | null;
}

export interface Address {
  street: string | null;
  unit: string | null;
  city: string | null;
  /** Two-letter Canadian province/territory code when recognised, else the text as given. */
  province: string | null;
  postal_code: string | null;
}

export interface Contact {
  phone: string | null;
  cell: string | null;
  email: string | null;
}

export interface Personal {
  /** ISO 8601 calendar date (YYYY-MM-DD). */
  dob: string | null;
  citizenship: string | null;
  dependents: number | null;
  marital_status: string | null;
}

export interface Employment {
  occupation: string | null;
  employer: string | null;
  years_employed: number | null;
  is_self_employed: boolean | null;
}

export interface SpouseEmployment {
  occupation: string | null;
  employer: string | null;
}

export interface Financials {
  annual_income: number | null;
  spouse_income: number | null;
  other_income: number | null;
  total_income: number | null;
  net_financial_assets: number | null;
  non_financial_assets: number | null;
  total_assets: number | null;
  liabilities: number | null;
  net_worth: number | null;
  income_stable_2_years: boolean | null;
  borrowed_to_invest: boolean | null;
}

/** Percentages of total assets, 0–100. */
export interface AssetComposition {
  cash_pct: number | null;
  stocks_pct: number | null;
  bonds_pct: number | null;
  real_estate_pct: number | null;
  other_pct: number | null;
}

export interface InvestmentProfile {
  knowledge_level: KnowledgeLevel | null;
  risk_tolerance: RiskTolerance | null;
  risk_capacity: RiskCapacity | null;
  time_horizon: TimeHorizon | null;
  investment_objective: InvestmentObjective | null;
  planned_retirement_year: number | null;
  /** Distinct product types, in PRODUCT_TYPES order. */
  products_owned: ProductType[] | null;
}

/** The proposed trade, used by the trade suitability form. */
export interface InvestmentDetails {
  issuer: string | null;
  amount: number | null;
  source_of_funds: SourceOfFunds | null;
}

export interface CorporateInfo {
  legal_name: string | null;
  cra_business_number: string | null;
  industry_type: string | null;
  province_of_incorporation: string | null;
  date_of_incorporation: string | null;
}

export interface Holding {
  description: string;
  amount: number;
}

export interface ExemptionStatus {
  is_accredited: boolean;
  is_eligible: boolean;
  accreditation_reason: string;
}

export interface Aml {
  is_pep: boolean | null;
  pep_position: string | null;
  is_hio: boolean | null;
}

export interface ConfidenceScores {
  client_name: ConfidenceLevel;
  financials: ConfidenceLevel;
  risk_profile: ConfidenceLevel;
}

/** A total the normaliser replaced because it disagreed with its components. */
export interface TotalAdjustment {
  path: string;
  provided: number;
  computed: number;
}

export interface KycRecord {
  client_name: ClientName;
  spouse_name: SpouseName;
  address: Address;
  contact: Contact;
  personal: Personal;
  employment: Employment;
  spouse_employment: SpouseEmployment;
  financials: Financials;
  asset_composition: AssetComposition;
  investment_profile: InvestmentProfile;
  investment_details: InvestmentDetails;
  corporate_info: CorporateInfo;
  /** Holdings breakdown; null when the transcript disclosed none. */
  holdings: Holding[] | null;
  /** Null until a validation pass derives it. Never taken from extraction. */
  exemption_status: ExemptionStatus | null;
  aml: Aml;
  /** Never populated by extraction. */
  sin: null;
  /** Never populated by extraction. */
  bank_account: null;
  confidence_scores: ConfidenceScores;
  adjustments: TotalAdjustment[];
  missing_fields: string[];
  ambiguous_items: string[];
  follow_up_questions: string[];
}

export type SectionName =
  | "client_name"
  | "spouse_name"
  | "address"
  | "contact"
  | "personal"
  | "employment"
  | "spouse_employment"
  | "financials"
  | "asset_composition"
  | "investment_profile"
  | "investment_details"
  | "corporate_info"
  | "aml";

// ---------------------------------------------------------------------------
// Field-trust model
// ---------------------------------------------------------------------------

/**
 * Paths that extraction must never populate. The normaliser nulls these
 * unconditionally and never lists them in `missing_fields`. Aliases cover
 * the shapes a backend has been seen to emit them in.
 */
export const FORBIDDEN_FIELD_PATHS: readonly string[] = [
  "sin",
  "social_insurance_number",
  "personal.sin",
  "personal.social_insurance_number",
  "bank_account",
  "bank_account_number",
  "account_number",
  "transit_number",
  "institution_number",
  "banking",
];

export type FieldKind =
  | { type: "text" }
  | { type: "name" }
  | { type: "province" }
  | { type: "date" }
  | { type: "integer" }
  | { type: "money"; signed?: boolean }
  | { type: "number"; min?: number; max?: number }
  | { type: "boolean" }
  | { type: "enum"; values: readonly string[] }
  | { type: "enum_set"; values: readonly string[] };

export interface FieldSpec {
  name: string;
  kind: FieldKind;
  description?: string;
}

export interface SectionSpec {
  section: SectionName;
  fields: readonly FieldSpec[];
}

const text = { type: "text" } as const;
const name = { type: "name" } as const;
const money = { type: "money" } as const;
const flag = { type: "boolean" } as const;

export const KYC_FIELD_TABLE: readonly SectionSpec[] = [
  {
    section: "client_name",
    fields: [
      { name: "first", kind: name, description: "Given name, transliterated to the Latin alphabet" },
      { name: "middle", kind: name },
      { name: "last", kind: name, description: "Family name, transliterated to the Latin alphabet" },
    ],
  },
  {
    section: "spouse_name",
    fields: [
      { name: "first", kind: name },
      { name: "last", kind: name },
    ],
  },
  {
    section: "address",
    fields: [
      { name: "street", kind: text, description: "Street address (not a PO box)" },
      { name: "unit", kind: text },
      { name: "city", kind: text },
      { name: "province", kind: { type: "province" }, description: "Canadian province, e.g. 'AB'" },
      { name: "postal_code", kind: text },
    ],
  },
  {
    section: "contact",
    fields: [
      { name: "phone", kind: text },
      { name: "cell", kind: text },
      { name: "email", kind: text },
    ],
  },
  {
    section: "personal",
    fields: [
      { name: "dob", kind: { type: "date" }, description: "Date of birth, YYYY-MM-DD" },
      { name: "citizenship", kind: text },
      { name: "dependents", kind: { type: "integer" } },
      { name: "marital_status", kind: text },
    ],
  },
  {
    section: "employment",
    fields: [
      { name: "occupation", kind: text },
      { name: "employer", kind: text },
      { name: "years_employed", kind: { type: "number", min: 0 } },
      { name: "is_self_employed", kind: flag },
    ],
  },
  {
    section: "spouse_employment",
    fields: [
      { name: "occupation", kind: text },
      { name: "employer", kind: text },
    ],
  },
  {
    section: "financials",
    fields: [
      { name: "annual_income", kind: money, description: "Client's own annual income, CAD" },
      { name: "spouse_income", kind: money, description: "Spouse or partner annual income, CAD" },
      { name: "other_income", kind: money },
      { name: "total_income", kind: money },
      { name: "net_financial_assets", kind: money, description: "Financial assets net of related liabilities, CAD" },
      { name: "non_financial_assets", kind: money, description: "Real estate and other non-financial assets, CAD" },
      { name: "total_assets", kind: money },
      { name: "liabilities", kind: money },
      { name: "net_worth", kind: { type: "money", signed: true } },
      { name: "income_stable_2_years", kind: flag, description: "Income at this level for each of the last two years and expected to continue" },
      { name: "borrowed_to_invest", kind: flag },
    ],
  },
  {
    section: "asset_composition",
    fields: [
      { name: "cash_pct", kind: { type: "number", min: 0, max: 100 } },
      { name: "stocks_pct", kind: { type: "number", min: 0, max: 100 } },
      { name: "bonds_pct", kind: { type: "number", min: 0, max: 100 } },
      { name: "real_estate_pct", kind: { type: "number", min: 0, max: 100 } },
      { name: "other_pct", kind: { type: "number", min: 0, max: 100 } },
    ],
  },
  {
    section: "investment_profile",
    fields: [
      { name: "knowledge_level", kind: { type: "enum", values: KNOWLEDGE_LEVELS } },
      {
        name: "risk_tolerance",
        kind: { type: "enum", values: RISK_TOLERANCES },
        description: "LOW: can't lose money; MODERATE: some risk is fine; HIGH: maximise returns, willing to lose",
      },
      { name: "risk_capacity", kind: { type: "enum", values: RISK_CAPACITIES } },
      { name: "time_horizon", kind: { type: "enum", values: TIME_HORIZONS } },
      { name: "investment_objective", kind: { type: "enum", values: INVESTMENT_OBJECTIVES } },
      { name: "planned_retirement_year", kind: { type: "integer" } },
      { name: "products_owned", kind: { type: "enum_set", values: PRODUCT_TYPES } },
    ],
  },
  {
    section: "investment_details",
    fields: [
      { name: "issuer", kind: text },
      { name: "amount", kind: money, description: "Proposed investment amount, CAD" },
      { name: "source_of_funds", kind: { type: "enum", values: SOURCES_OF_FUNDS } },
    ],
  },
  {
    section: "corporate_info",
    fields: [
      { name: "legal_name", kind: text },
      { name: "cra_business_number", kind: text },
      { name: "industry_type", kind: text },
      { name: "province_of_incorporation", kind: { type: "province" } },
      { name: "date_of_incorporation", kind: { type: "date" } },
    ],
  },
  {
    section: "aml",
    fields: [
      { name: "is_pep", kind: flag, description: "Politically exposed person (domestic or foreign)" },
      { name: "pep_position", kind: text },
      { name: "is_hio", kind: flag, description: "Head of an international organization" },
    ],
  },
];

/** Canonical dotted paths of every extractable field, in schema order. */
export function canonicalFieldPaths(): string[] {
  return KYC_FIELD_TABLE.flatMap((s) => s.fields.map((f) => `${s.section}.${f.name}`));
}

// ---------------------------------------------------------------------------
// Extraction tool schema
// ---------------------------------------------------------------------------

export type JsonSchema = { [key: string]: unknown };

function fieldSchema(field: FieldSpec): JsonSchema {
  const base = (() => {
    switch (field.kind.type) {
      case "text":
      case "name":
      case "province":
        return { type: ["string", "null"] };
      case "date":
        return { type: ["string", "null"], format: "date" };
      case "integer":
        return { type: ["integer", "null"] };
      case "money":
      case "number":
        return { type: ["number", "null"] };
      case "boolean":
        return { type: ["boolean", "null"] };
      case "enum":
        return { type: ["string", "null"], enum: [...field.kind.values, null] };
      case "enum_set":
        return { type: "array", items: { type: "string", enum: [...field.kind.values] } };
    }
  })();
  return field.description ? { ...base, description: field.description } : base;
}

const confidenceSchema = { type: "string", enum: [...CONFIDENCE_LEVELS] };

/**
 * JSON schema for a tool-use extraction call. Forbidden fields are not part of
 * it, and nothing derived (exemption status, totals checks) is asked for.
 */
export function extractionJsonSchema(): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  for (const section of KYC_FIELD_TABLE) {
    const fields: Record<string, JsonSchema> = {};
    for (const field of section.fields) fields[field.name] = fieldSchema(field);
    properties[section.section] = { type: "object", properties: fields };
  }

  properties.holdings = {
    type: "array",
    description: "Individual holdings the client disclosed, with their CAD value",
    items: {
      type: "object",
      properties: {
        description: { type: "string" },
        amount: { type: "number" },
      },
      required: ["description", "amount"],
    },
  };
  properties.confidence_scores = {
    type: "object",
    properties: {
      client_name: confidenceSchema,
      financials: confidenceSchema,
      risk_profile: confidenceSchema,
    },
  };
  properties.ambiguous_items = {
    type: "array",
    items: { type: "string" },
    description: "Statements that need clarification before filing",
  };
  properties.follow_up_questions = {
    type: "array",
    items: { type: "string" },
    description: "Questions to ask the client about missing or unclear information",
  };

  return {
    type: "object",
    properties,
    required: KYC_FIELD_TABLE.map((s) => s.section),
  };
}

// ---------------------------------------------------------------------------
// Completeness per form
// ---------------------------------------------------------------------------

/** Fields a filing of each form type cannot be approved without. */
export const REQUIRED_FIELDS: Record<FormType, readonly string[]> = {
  individual: [
    "client_name.first",
    "client_name.last",
    "address.city",
    "address.province",
    "contact.email",
    "personal.dob",
    "employment.occupation",
    "financials.annual_income",
    "financials.net_financial_assets",
    "investment_profile.risk_tolerance",
    "investment_profile.time_horizon",
    "investment_profile.investment_objective",
  ],
  corporate: [
    "corporate_info.legal_name",
    "corporate_info.cra_business_number",
    "address.city",
    "address.province",
    "financials.annual_income",
    "financials.net_financial_assets",
  ],
  trade_suitability: [
    "client_name.first",
    "client_name.last",
    "investment_details.issuer",
    "investment_details.amount",
    "investment_details.source_of_funds",
  ],
};

/** Question suggested to the dealing representative when a required field is missing. */
export const FOLLOW_UP_PROMPTS: Record<string, string> = {
  "client_name.first": "What is the client's legal first name?",
  "client_name.last": "What is the client's legal last name?",
  "address.city": "Which city does the client live in?",
  "address.province": "Which province does the client live in?",
  "contact.email": "What email address should we use for the client?",
  "personal.dob": "What is the client's date of birth?",
  "employment.occupation": "What is the client's occupation?",
  "financials.annual_income": "What is the client's annual income before tax?",
  "financials.net_financial_assets":
    "What are the client's financial assets (cash, securities) net of related debt?",
  "investment_profile.risk_tolerance":
    "How would the client react to a significant short-term loss on this investment?",
  "investment_profile.time_horizon": "When does the client expect to need this money?",
  "investment_profile.investment_objective":
    "Is the client investing mainly for growth, income, or tax efficiency?",
  "corporate_info.legal_name": "What is the corporation's full legal name?",
  "corporate_info.cra_business_number": "What is the corporation's CRA business number?",
  "investment_details.issuer": "Which issuer is the client investing in?",
  "investment_details.amount": "How much does the client intend to invest?",
  "investment_details.source_of_funds":
    "Where are the funds coming from (non-registered, RRSP, TFSA, borrowed)?",
};
