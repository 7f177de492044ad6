/**
 * Shared fixtures for the KYC tests: a complete raw extraction for a salaried
 * Alberta client, with per-section overrides.
 */

import { isPlainObject } from "../../kyc/coerce.js";
import { normalize, type NormaliseOptions } from "../../kyc/normaliser.js";
import type { KycRecord, SourceLanguage } from "../../kyc/schema.js";

export const AS_OF = "2026-10-19";

function baseExtraction(): Record<string, unknown> {
  return {
    client_name: { first: "Ivan", middle: null, last: "Petrenko" },
    spouse_name: { first: "Olena", last: "Petrenko" },
    address: {
      street: "123 Main Street",
      unit: null,
      city: "Calgary",
      province: "AB",
      postal_code: "T2P 1J9",
    },
    contact: { phone: "403-555-0100", cell: null, email: "ivan@example.com" },
    personal: { dob: "1980-01-15", citizenship: "Canada", dependents: 2, marital_status: "married" },
    employment: {
      occupation: "Engineer",
      employer: "Prairie Pipelines Ltd",
      years_employed: 8,
      is_self_employed: false,
    },
    spouse_employment: { occupation: "Teacher", employer: "Calgary Board of Education" },
    financials: {
      annual_income: 180_000,
      spouse_income: 75_000,
      other_income: null,
      total_income: null,
      net_financial_assets: 250_000,
      non_financial_assets: 800_000,
      total_assets: null,
      liabilities: 400_000,
      net_worth: null,
      income_stable_2_years: true,
      borrowed_to_invest: false,
    },
    asset_composition: {
      cash_pct: 10,
      stocks_pct: 40,
      bonds_pct: 20,
      real_estate_pct: 25,
      other_pct: 5,
    },
    investment_profile: {
      knowledge_level: "AVERAGE",
      risk_tolerance: "MODERATE",
      risk_capacity: "MEDIUM",
      time_horizon: "10+",
      investment_objective: "GROWTH_AND_INCOME",
      planned_retirement_year: 2045,
      products_owned: ["STOCKS", "ETFS"],
    },
    investment_details: { issuer: null, amount: null, source_of_funds: null },
    corporate_info: {
      legal_name: null,
      cra_business_number: null,
      industry_type: null,
      province_of_incorporation: null,
      date_of_incorporation: null,
    },
    aml: { is_pep: false, pep_position: null, is_hio: false },
    holdings: [],
    confidence_scores: { client_name: "HIGH", financials: "HIGH", risk_profile: "MEDIUM" },
    ambiguous_items: [],
    follow_up_questions: [],
  };
}

/** The base extraction with each override merged into its section. */
export function rawExtraction(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const raw = baseExtraction();
  for (const [key, value] of Object.entries(overrides)) {
    const current = raw[key];
    raw[key] = isPlainObject(current) && isPlainObject(value) ? { ...current, ...value } : value;
  }
  return raw;
}

export function normalisedRecord(
  overrides: Record<string, unknown> = {},
  language: SourceLanguage = "en",
  options: NormaliseOptions = {}
): KycRecord {
  return normalize(rawExtraction(overrides), language, { asOf: AS_OF, ...options });
}
