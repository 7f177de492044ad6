/**
 * Tests for kyc/validator.ts: NI 45-106 tiers, red flags, suitability concerns
 * and warnings.
 */

import { describe, it } from "vitest";
import assert from "node:assert/strict";
import { normalize } from "../../kyc/normaliser.js";
import { ageOn, validate, withExemption } from "../../kyc/validator.js";
import { AS_OF, normalisedRecord, rawExtraction } from "./fixtures.js";

const NULL_FINANCIALS = {
  annual_income: null,
  spouse_income: null,
  other_income: null,
  total_income: null,
  net_financial_assets: null,
  non_financial_assets: null,
  total_assets: null,
  liabilities: null,
  net_worth: null,
  income_stable_2_years: null,
  borrowed_to_invest: null,
};

function check(overrides: Record<string, unknown> = {}) {
  return validate(normalisedRecord(overrides), { asOf: AS_OF });
}

describe("validate: exemption classification", () => {
  it("classifies a joint-income household as Eligible", () => {
    const result = check();

    assert.equal(result.category, "ELIGIBLE");
    assert.deepEqual(result.exemption, {
      is_accredited: false,
      is_eligible: true,
      accreditation_reason:
        "annual_income >= 75,000; annual_income + spouse_income >= 125,000; net_worth >= 400,000",
    });
    assert.deepEqual(result.red_flags, []);
    assert.deepEqual(result.warnings, ["ELIGIBLE_INVESTMENT_LIMIT"]);
    assert.equal(result.classification_basis, "COMPLETE");
    assert.equal(result.is_valid, true);
    assert.equal(result.follow_up_needed, false);
  });

  it("accredits on net financial assets of 1,000,000 whatever else is present", () => {
    const variants: Array<Record<string, unknown>> = [
      { financials: { net_financial_assets: 1_000_000 } },
      { financials: { ...NULL_FINANCIALS, net_financial_assets: 1_000_000 } },
      {
        financials: { net_financial_assets: 1_000_000, annual_income: 0, borrowed_to_invest: true },
        aml: { is_pep: true },
      },
    ];
    for (const overrides of variants) {
      const result = check(overrides);
      assert.equal(result.category, "ACCREDITED");
      assert.equal(result.exemption.is_accredited, true);
      assert.match(result.exemption.accreditation_reason, /net_financial_assets >= 1,000,000/);
    }
  });

  it("accredits on single income only when it was stable for two years", () => {
    const stable = check({ financials: { annual_income: 210_000 } });
    assert.equal(stable.category, "ACCREDITED");
    assert.equal(
      stable.exemption.accreditation_reason,
      "annual_income >= 200,000 for 2 years"
    );

    const unstable = check({
      financials: { annual_income: 210_000, income_stable_2_years: false },
    });
    assert.equal(unstable.category, "ELIGIBLE");
  });

  it("accredits on joint income", () => {
    const result = check({ financials: { spouse_income: 130_000 } });
    assert.equal(result.category, "ACCREDITED");
    assert.equal(
      result.exemption.accreditation_reason,
      "annual_income + spouse_income >= 300,000 for 2 years"
    );
  });

  it("treats null figures as not meeting any threshold", () => {
    const result = check({ financials: NULL_FINANCIALS });

    assert.equal(result.category, "NON_ELIGIBLE");
    assert.deepEqual(result.exemption, {
      is_accredited: false,
      is_eligible: false,
      accreditation_reason: "no accredited or eligible investor threshold met",
    });
    assert.equal(result.classification_basis, "PARTIAL");
    assert.deepEqual(result.warnings, [
      "INSUFFICIENT_DATA_FOR_CLASSIFICATION",
      "MINIMUM_AMOUNT_EXEMPTION_CAP",
    ]);
  });

  it("does not accredit on a null income even when it is marked stable", () => {
    const result = check({ financials: { ...NULL_FINANCIALS, income_stable_2_years: true } });
    assert.equal(result.exemption.is_accredited, false);
    assert.equal(result.category, "NON_ELIGIBLE");
  });

  it("skips the investment limit warning for BC residents", () => {
    const result = check({ address: { province: "British Columbia" } });
    assert.equal(result.category, "ELIGIBLE");
    assert.deepEqual(result.warnings, []);
  });
});

describe("validate: red flags", () => {
  it("flags a PEP without changing the tier", () => {
    const result = check({
      financials: { net_financial_assets: 1_200_000 },
      aml: { is_pep: true, pep_position: "Member of Parliament" },
    });

    assert.equal(result.category, "ACCREDITED");
    assert.deepEqual(result.red_flags, ["PEP"]);
    assert.equal(
      result.messages[0].message,
      "Client is a politically exposed person: Member of Parliament"
    );
    assert.deepEqual(result.warnings, ["NFA_VERIFICATION_REQUIRED"]);
    assert.equal(result.is_valid, false);
    assert.equal(result.follow_up_needed, true);
  });

  it("flags high risk tolerance only against low or nil capacity", () => {
    const mismatch = check({ investment_profile: { risk_tolerance: "HIGH", risk_capacity: "NIL" } });
    assert.ok(mismatch.red_flags.includes("RISK_MISMATCH"));

    const lowCapacity = check({ investment_profile: { risk_tolerance: "HIGH", risk_capacity: "LOW" } });
    assert.deepEqual(lowCapacity.red_flags, ["RISK_MISMATCH"]);
    assert.equal(
      lowCapacity.messages[0].message,
      "Risk tolerance (HIGH) exceeds risk capacity (LOW)"
    );
    assert.equal(lowCapacity.is_valid, false);

    const moderate = check({ investment_profile: { risk_tolerance: "MODERATE", risk_capacity: "NIL" } });
    assert.deepEqual(moderate.red_flags, []);
    assert.equal(moderate.is_valid, true);

    const cautious = check({ investment_profile: { risk_tolerance: "LOW", risk_capacity: "HIGH" } });
    assert.equal(cautious.red_flags.includes("RISK_MISMATCH"), false);

    const oneStep = check({ investment_profile: { risk_tolerance: "HIGH", risk_capacity: "MEDIUM" } });
    assert.equal(oneStep.red_flags.includes("RISK_MISMATCH"), false);
  });

  it("flags an older client with high risk on a short horizon", () => {
    const result = check({
      personal: { dob: "1950-05-01" },
      investment_profile: { risk_tolerance: "HIGH", time_horizon: "1-3" },
    });
    assert.deepEqual(result.red_flags, ["AGE_RISK_CONCERN"]);
    assert.equal(
      result.messages[0].message,
      "Client is 76 with HIGH risk tolerance and a 1-3 year horizon"
    );
  });

  it("suppresses the age flag when date of birth is unknown", () => {
    const raw = rawExtraction({
      investment_profile: { risk_tolerance: "HIGH", time_horizon: "1-3" },
    });
    raw.personal = { citizenship: "Canada" };
    const record = normalize(raw, "en", { asOf: AS_OF });
    const result = validate(record, { asOf: AS_OF });

    assert.ok(record.missing_fields.includes("personal.dob"));
    assert.equal(result.red_flags.includes("AGE_RISK_CONCERN"), false);
  });

  it("flags concentrated holdings, borrowing and HIO in fixed order", () => {
    const result = check({
      holdings: [
        { description: "ACME Corp shares", amount: 30_000 },
        { description: "Index ETF", amount: 20_000 },
      ],
      financials: { borrowed_to_invest: true },
      aml: { is_hio: true },
    });

    assert.deepEqual(result.red_flags, ["HIO", "HIGH_CONCENTRATION", "BORROWED_TO_INVEST"]);
    const concentration = result.messages.find((m) => m.kind === "HIGH_CONCENTRATION");
    assert.equal(
      concentration?.message,
      "Holding(s) above 10% of net financial assets: ACME Corp shares"
    );
  });
});

describe("validate: warnings", () => {
  it("reports totals the normaliser recomputed", () => {
    const result = check({ financials: { total_income: 300_000 } });
    const totals = result.messages.find((m) => m.kind === "INCONSISTENT_TOTALS");
    assert.equal(
      totals?.message,
      "Recomputed from components: financials.total_income (stated 300,000, computed 255,000)"
    );
  });

  it("warns when the proposed investment is a large share of financial assets", () => {
    const result = check({ investment_details: { issuer: "Prairie MIC", amount: 50_000 } });
    const warning = result.messages.find((m) => m.kind === "INVESTMENT_CONCENTRATION");
    assert.equal(
      warning?.message,
      "Proposed investment is 20.0% of net financial assets; document the suitability rationale"
    );
  });

  it("warns on an income objective with high risk tolerance", () => {
    const result = check({
      investment_profile: { investment_objective: "INCOME", risk_tolerance: "HIGH" },
    });
    assert.deepEqual(result.warnings, ["ELIGIBLE_INVESTMENT_LIMIT", "OBJECTIVE_RISK_MISALIGNMENT"]);
    assert.deepEqual(result.suitability_concerns, []);
    assert.equal(result.follow_up_needed, false);
  });
});

describe("validate: suitability concerns", () => {
  it("has none for a consistent profile", () => {
    const result = check();
    assert.deepEqual(result.suitability_concerns, []);
    assert.equal(result.messages.some((m) => m.severity === "suitability"), false);
  });

  it("needs follow-up for a growth objective with low risk tolerance", () => {
    const result = check({
      investment_profile: { investment_objective: "GROWTH", risk_tolerance: "LOW" },
    });
    assert.deepEqual(result.suitability_concerns, ["GROWTH_WITH_LOW_TOLERANCE"]);
    assert.deepEqual(result.red_flags, []);
    assert.equal(result.is_valid, true);
    assert.equal(result.follow_up_needed, true);
  });

  it("needs follow-up for a long horizon close to retirement", () => {
    const result = check({ investment_profile: { planned_retirement_year: 2028 } });
    assert.deepEqual(result.suitability_concerns, ["RETIREMENT_HORIZON_MISMATCH"]);
    const concern = result.messages.find((m) => m.kind === "RETIREMENT_HORIZON_MISMATCH");
    assert.deepEqual(concern, {
      kind: "RETIREMENT_HORIZON_MISMATCH",
      severity: "suitability",
      message: "10+ year horizon but retirement is planned in 2 year(s)",
    });
    assert.equal(result.follow_up_needed, true);
  });

  it("needs follow-up for an older client on a long horizon", () => {
    const result = check({ personal: { dob: "1950-05-01" } });
    assert.deepEqual(result.suitability_concerns, ["ELDERLY_LONG_HORIZON"]);
    assert.equal(result.follow_up_needed, true);
  });

  it("raises the age concern at 65 with high risk tolerance on any horizon", () => {
    const result = check({
      personal: { dob: "1961-01-15" },
      investment_profile: { risk_tolerance: "HIGH" },
    });
    assert.deepEqual(result.red_flags, []);
    assert.deepEqual(result.suitability_concerns, ["ELDERLY_HIGH_TOLERANCE"]);
    assert.equal(
      result.messages.find((m) => m.kind === "ELDERLY_HIGH_TOLERANCE")?.message,
      "Client is 65 with HIGH risk tolerance"
    );
    assert.equal(result.follow_up_needed, true);

    const younger = check({
      personal: { dob: "1961-12-01" },
      investment_profile: { risk_tolerance: "HIGH" },
    });
    assert.deepEqual(younger.suitability_concerns, []);
  });

  it("needs follow-up when the proposed investment exceeds a quarter of financial assets", () => {
    const result = check({ investment_details: { issuer: "Prairie MIC", amount: 100_000 } });
    assert.deepEqual(result.suitability_concerns, ["HIGH_INVESTMENT_CONCENTRATION"]);
    assert.ok(result.warnings.includes("INVESTMENT_CONCENTRATION"));
    assert.equal(
      result.messages.find((m) => m.kind === "HIGH_INVESTMENT_CONCENTRATION")?.message,
      "Proposed investment is 40.0% of net financial assets"
    );
    assert.equal(result.follow_up_needed, true);

    const quarter = check({ investment_details: { issuer: "Prairie MIC", amount: 62_500 } });
    assert.deepEqual(quarter.suitability_concerns, []);
    assert.equal(quarter.follow_up_needed, false);
  });

  it("orders concern messages between red flags and warnings", () => {
    const result = check({
      aml: { is_pep: true },
      investment_profile: { investment_objective: "GROWTH", risk_tolerance: "LOW" },
    });
    assert.deepEqual(
      result.messages.map((m) => m.severity),
      ["red_flag", "suitability", "warning"]
    );
  });
});

describe("validate: completeness", () => {
  it("needs follow-up when more than three required fields are missing", () => {
    const result = check({
      address: { city: null },
      contact: { email: null },
      personal: { dob: null },
      employment: { occupation: null },
    });

    assert.deepEqual(result.missing_required, [
      "address.city",
      "contact.email",
      "personal.dob",
      "employment.occupation",
    ]);
    assert.deepEqual(result.red_flags, []);
    assert.equal(result.is_valid, false);
    assert.equal(result.follow_up_needed, true);
  });

  it("stays valid with three required fields missing", () => {
    const result = check({
      address: { city: null },
      contact: { email: null },
      personal: { dob: null },
    });
    assert.equal(result.missing_required.length, 3);
    assert.equal(result.is_valid, true);
    assert.equal(result.follow_up_needed, false);
  });
});

describe("validate: purity", () => {
  it("returns identical results for identical input", () => {
    const raw = rawExtraction({ aml: { is_pep: true }, financials: { total_income: 1 } });
    const first = validate(normalize(raw, "ru", { asOf: AS_OF }), { asOf: AS_OF });
    const second = validate(normalize(raw, "ru", { asOf: AS_OF }), { asOf: AS_OF });
    assert.equal(JSON.stringify(first), JSON.stringify(second));
  });

  it("does not mutate the record", () => {
    const record = normalisedRecord();
    const before = structuredClone(record);
    validate(record, { asOf: AS_OF });
    assert.deepEqual(record, before);
  });

  it("withExemption returns a copy carrying the derived status", () => {
    const record = normalisedRecord();
    const validation = validate(record, { asOf: AS_OF });
    const filed = withExemption(record, validation);

    assert.equal(record.exemption_status, null);
    assert.deepEqual(filed.exemption_status, validation.exemption);
  });
});

describe("ageOn", () => {
  it("counts whole years up to the reference date", () => {
    assert.equal(ageOn("1960-03-05", "2026-03-04"), 65);
    assert.equal(ageOn("1960-03-05", "2026-03-05"), 66);
    assert.equal(ageOn(null, "2026-03-05"), null);
  });
});
