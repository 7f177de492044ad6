/**
 * Tests for kyc/coerce.ts.
 */

import { describe, it } from "vitest";
import assert from "node:assert/strict";
import {
  coerceBoolean,
  coerceEnum,
  coerceEnumSet,
  coerceInteger,
  coerceIsoDate,
  coerceMoney,
  coerceNumber,
  coerceProvince,
  coerceStringList,
  coerceText,
  isLatinName,
} from "../../kyc/coerce.js";
import {
  INVESTMENT_OBJECTIVES,
  PRODUCT_TYPES,
  RISK_TOLERANCES,
  TIME_HORIZONS,
} from "../../kyc/schema.js";

describe("coerceText", () => {
  it("collapses whitespace and trims", () => {
    assert.equal(coerceText("  123   Main\n Street "), "123 Main Street");
  });

  it("treats placeholder words as absent", () => {
    assert.equal(coerceText("N/A"), null);
    assert.equal(coerceText("unknown"), null);
    assert.equal(coerceText(""), null);
  });

  it("stringifies finite numbers and rejects other types", () => {
    assert.equal(coerceText(42), "42");
    assert.equal(coerceText({ city: "Calgary" }), null);
  });
});

describe("isLatinName", () => {
  it("accepts Latin names with diacritics and punctuation", () => {
    assert.equal(isLatinName("Ivan"), true);
    assert.equal(isLatinName("O'Brien-Smith"), true);
    assert.equal(isLatinName("Zoë"), true);
  });

  it("rejects Cyrillic and mixed-script names", () => {
    assert.equal(isLatinName("Иван"), false);
    assert.equal(isLatinName("Ivanов"), false);
  });
});

describe("coerceNumber", () => {
  it("passes finite numbers through", () => {
    assert.equal(coerceNumber(180000), 180000);
    assert.equal(coerceNumber(Number.NaN), null);
  });

  it("reads thousands separators and currency markers", () => {
    assert.equal(coerceNumber("$1,250,000"), 1_250_000);
    assert.equal(coerceNumber("C$ 90,000"), 90_000);
    assert.equal(coerceNumber("1.250.000"), 1_250_000);
    assert.equal(coerceNumber("1 250 000,50"), 1_250_000.5);
  });

  it("reads a lone comma as a decimal mark unless it groups thousands", () => {
    assert.equal(coerceNumber("2,5"), 2.5);
    assert.equal(coerceNumber("250,000"), 250_000);
  });

  it("applies multiplier words in English, Russian and Ukrainian", () => {
    assert.equal(coerceNumber("180k"), 180_000);
    assert.equal(coerceNumber("1.5 million"), 1_500_000);
    assert.equal(coerceNumber("1,2 млн"), 1_200_000);
    assert.equal(coerceNumber("250 тысяч долларов"), 250_000);
    assert.equal(coerceNumber("300 тисяч"), 300_000);
  });

  it("reads standalone amount words", () => {
    assert.equal(coerceNumber("half a million"), 500_000);
    assert.equal(coerceNumber("полмиллиона"), 500_000);
    assert.equal(coerceNumber("a million"), 1_000_000);
    assert.equal(coerceNumber("zero"), 0);
  });

  it("rejects text it cannot read as a single amount", () => {
    assert.equal(coerceNumber("about 100k"), null);
    assert.equal(coerceNumber("12 apples"), null);
    assert.equal(coerceNumber("lots"), null);
    assert.equal(coerceNumber(true), null);
  });
});

describe("coerceMoney / coerceInteger", () => {
  it("rejects negative amounts unless signed", () => {
    assert.equal(coerceMoney("-5000"), null);
    assert.equal(coerceMoney("-5000", true), -5000);
  });

  it("accepts only non-negative whole numbers as integers", () => {
    assert.equal(coerceInteger("3"), 3);
    assert.equal(coerceInteger("2.5"), null);
    assert.equal(coerceInteger(-1), null);
  });
});

describe("coerceIsoDate", () => {
  it("accepts ISO dates and date-times", () => {
    assert.equal(coerceIsoDate("1985-03-14"), "1985-03-14");
    assert.equal(coerceIsoDate("1985-03-14T00:00:00Z"), "1985-03-14");
  });

  it("rejects impossible and non-ISO dates", () => {
    assert.equal(coerceIsoDate("1985-02-30"), null);
    assert.equal(coerceIsoDate("14/03/1985"), null);
    assert.equal(coerceIsoDate("March 14, 1985"), null);
  });

  it("rejects dates after the reference date", () => {
    assert.equal(coerceIsoDate("2027-01-01", "2026-10-19"), null);
    assert.equal(coerceIsoDate("2026-10-19", "2026-10-19"), "2026-10-19");
  });
});

describe("coerceBoolean", () => {
  it("reads booleans in three languages", () => {
    assert.equal(coerceBoolean(true), true);
    assert.equal(coerceBoolean("Yes"), true);
    assert.equal(coerceBoolean("да"), true);
    assert.equal(coerceBoolean("так"), true);
    assert.equal(coerceBoolean("нет"), false);
    assert.equal(coerceBoolean("ні"), false);
  });

  it("returns null for anything else", () => {
    assert.equal(coerceBoolean("maybe"), null);
    assert.equal(coerceBoolean(2), null);
  });
});

describe("coerceEnum", () => {
  it("ignores case, spacing and a trailing 'years'", () => {
    assert.equal(coerceEnum("moderate", RISK_TOLERANCES), "MODERATE");
    assert.equal(coerceEnum("10+ years", TIME_HORIZONS), "10+");
    assert.equal(coerceEnum("3 - 5", TIME_HORIZONS), "3-5");
    assert.equal(coerceEnum("growth and income", INVESTMENT_OBJECTIVES), "GROWTH_AND_INCOME");
  });

  it("returns null for values outside the set", () => {
    assert.equal(coerceEnum("AGGRESSIVE", RISK_TOLERANCES), null);
    assert.equal(coerceEnum(3, RISK_TOLERANCES), null);
  });
});

describe("coerceEnumSet", () => {
  it("dedupes and orders by the enumeration", () => {
    assert.deepEqual(coerceEnumSet(["etfs", "Stocks", "STOCKS", "bogus"], PRODUCT_TYPES), [
      "STOCKS",
      "ETFS",
    ]);
  });

  it("keeps an empty list and rejects a list with no valid entry", () => {
    assert.deepEqual(coerceEnumSet([], PRODUCT_TYPES), []);
    assert.equal(coerceEnumSet(["bogus"], PRODUCT_TYPES), null);
    assert.equal(coerceEnumSet("STOCKS", PRODUCT_TYPES), null);
  });
});

describe("coerceProvince", () => {
  it("maps codes and English names to two-letter codes", () => {
    assert.equal(coerceProvince("ab"), "AB");
    assert.equal(coerceProvince("B.C."), "BC");
    assert.equal(coerceProvince("British  Columbia"), "BC");
    assert.equal(coerceProvince("Québec"), "QC");
  });

  it("keeps unrecognised text as given", () => {
    assert.equal(coerceProvince("Bavaria"), "Bavaria");
  });
});

describe("coerceStringList", () => {
  it("drops empty entries and duplicates", () => {
    assert.deepEqual(coerceStringList(["Confirm DOB", "", "Confirm DOB", 7]), ["Confirm DOB", "7"]);
    assert.deepEqual(coerceStringList("Confirm DOB"), []);
  });
});
