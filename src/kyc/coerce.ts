/**
 * Fail-soft coercion of untrusted extraction values.
 *
 * Every function takes `unknown` and returns the typed value or null; none of
 * them throw. Numeric and boolean parsing understands the English, Russian and
 * Ukrainian forms that show up in transcripts ("180 тысяч", "1,2 млн", "так").
 */

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

const NULLISH_TEXT = new Set(["", "null", "none", "n/a", "na", "unknown", "-"]);

export function coerceText(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return null;
  const trimmed = value.replace(/\s+/g, " ").trim();
  return NULLISH_TEXT.has(trimmed.toLowerCase()) ? null : trimmed;
}

/** Latin letters (any diacritics), combining marks, spaces, hyphens, apostrophes, periods. */
const LATIN_NAME = /^[\p{Script=Latin}\p{M}][\p{Script=Latin}\p{M} '’.-]*$/u;

export function isLatinName(value: string): boolean {
  return LATIN_NAME.test(value);
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

const ISO_DATE = /^(\d{4})[-/](\d{2})[-/](\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Coerce to an ISO calendar date (YYYY-MM-DD). Rejects impossible dates and,
 * when `notAfter` is given, dates later than it.
 */
export function coerceIsoDate(value: unknown, notAfter?: string): string | null {
  const raw = coerceText(value);
  if (!raw) return null;
  const match = ISO_DATE.exec(raw);
  if (!match) return null;

  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    return null;
  }

  const iso = `${y}-${m}-${d}`;
  if (notAfter && iso > notAfter) return null;
  return iso;
}

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

const MULTIPLIER_WORDS: ReadonlyArray<[RegExp, number]> = [
  [/^(k|к|thousands?|grand|тыс\.?|тысяч[аи]?|тис\.?|тисяч[аі]?)$/, 1_000],
  [/^(m|mm|mln|million|millions|млн\.?|миллион(а|ов)?|мільйон(а|ів)?)$/, 1_000_000],
  [/^(b|bn|billion|billions|млрд\.?|миллиард(а|ов)?|мільярд(а|ів)?)$/, 1_000_000_000],
];

const STANDALONE_WORDS: ReadonlyArray<[RegExp, number]> = [
  [/^(zero|nothing|ноль|нуль|ничего|нічого)$/, 0],
  [/^(a |one )?thousand$|^тысяча$|^тисяча$/, 1_000],
  [/^half a million$|^полмиллиона$|^пів ?мільйона$/, 500_000],
  [/^(a |one )?million$|^миллион$|^мільйон$/, 1_000_000],
];

/** Currency markers stripped before parsing. */
const CURRENCY =
  /(c\$|us\$|\$|cad|usd|dollars?|bucks|долл?ар(ов|а|ів|и)?|руб(лей|ля)?|гривень|грн)/g;

/**
 * Parse a digit string that may use spaces, apostrophes, commas or periods
 * as thousands separators and either comma or period as the decimal mark.
 */
function parseDigits(digits: string): number | null {
  const compact = digits.replace(/[\s  '’]/g, "");
  if (!/^[+-]?[\d.,]+$/.test(compact) || !/\d/.test(compact)) return null;

  const lastComma = compact.lastIndexOf(",");
  const lastDot = compact.lastIndexOf(".");
  let normalised: string;

  if (lastComma >= 0 && lastDot >= 0) {
    // Whichever mark comes last is the decimal mark.
    normalised =
      lastComma > lastDot
        ? compact.replace(/\./g, "").replace(",", ".")
        : compact.replace(/,/g, "");
  } else if (lastComma >= 0) {
    normalised = /^[+-]?\d{1,3}(,\d{3})+$/.test(compact)
      ? compact.replace(/,/g, "")
      : compact.replace(",", ".");
  } else if (lastDot >= 0) {
    normalised = /^[+-]?\d{1,3}(\.\d{3}){2,}$/.test(compact)
      ? compact.replace(/\./g, "")
      : compact;
  } else {
    normalised = compact;
  }

  if (!/^[+-]?\d+(\.\d+)?$/.test(normalised)) return null;
  const parsed = Number(normalised);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Coerce a number given as a JSON number or as free text such as
 * "$1,250,000", "180k", "1,2 млн", "250 тысяч долларов" or "half a million".
 */
export function coerceNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  const cleaned = value
    .toLowerCase()
    .replace(CURRENCY, " ")
    .replace(/\s+/g, " ")
    .trim();
  if (!cleaned) return null;

  for (const [pattern, amount] of STANDALONE_WORDS) {
    if (pattern.test(cleaned)) return amount;
  }

  const match = /^([+-]?[\d\s  '’.,]*\d[\d.,]*)\s*(.*)$/.exec(cleaned);
  if (!match) return null;
  const base = parseDigits(match[1]);
  if (base === null) return null;

  const suffix = match[2].trim();
  if (!suffix) return base;
  for (const [pattern, multiplier] of MULTIPLIER_WORDS) {
    if (pattern.test(suffix)) return Math.round(base * multiplier * 100) / 100;
  }
  return null;
}

export function coerceInteger(value: unknown): number | null {
  const parsed = coerceNumber(value);
  return parsed !== null && Number.isInteger(parsed) && parsed >= 0 ? parsed : null;
}

export function coerceBoundedNumber(
  value: unknown,
  bounds: { min?: number; max?: number } = {}
): number | null {
  const parsed = coerceNumber(value);
  if (parsed === null) return null;
  if (bounds.min !== undefined && parsed < bounds.min) return null;
  if (bounds.max !== undefined && parsed > bounds.max) return null;
  return parsed;
}

/** Amounts of money; negatives only where `signed` (net worth can be negative). */
export function coerceMoney(value: unknown, signed = false): number | null {
  const parsed = coerceNumber(value);
  if (parsed === null) return null;
  return signed || parsed >= 0 ? parsed : null;
}

// ---------------------------------------------------------------------------
// Booleans
// ---------------------------------------------------------------------------

const TRUE_WORDS = new Set(["true", "yes", "y", "1", "да", "так", "верно", "правда"]);
const FALSE_WORDS = new Set(["false", "no", "n", "0", "нет", "ні", "неверно"]);

export function coerceBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value === 1 ? true : value === 0 ? false : null;
  if (typeof value !== "string") return null;
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return null;
}

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

function enumKey(value: string): string {
  return value
    .trim()
    .toUpperCase()
    .replace(/\s*-\s*/g, "-")
    .replace(/\s+(YEARS?|YRS?)$/, "")
    .replace(/[\s/&]+/g, "_")
    .replace(/_+/g, "_");
}

/** Match against an enumerated set, ignoring case, spacing and a trailing "years". */
export function coerceEnum<T extends string>(
  value: unknown,
  values: readonly T[]
): T | null {
  if (typeof value !== "string") return null;
  const key = enumKey(value);
  return values.find((v) => v === key) ?? null;
}

/**
 * Coerce a list to a distinct set of enumerated values in canonical order.
 * Null when the input is not a list, or is a non-empty list with no valid entry.
 */
export function coerceEnumSet<T extends string>(
  value: unknown,
  values: readonly T[]
): T[] | null {
  if (!Array.isArray(value)) return null;
  const found = new Set<T>();
  for (const item of value) {
    const coerced = coerceEnum(item, values);
    if (coerced) found.add(coerced);
  }
  if (value.length > 0 && found.size === 0) return null;
  return values.filter((v) => found.has(v));
}

// ---------------------------------------------------------------------------
// Provinces
// ---------------------------------------------------------------------------

const PROVINCE_NAMES: Record<string, string> = {
  AB: "alberta",
  BC: "british columbia",
  MB: "manitoba",
  NB: "new brunswick",
  NL: "newfoundland and labrador",
  NS: "nova scotia",
  NT: "northwest territories",
  NU: "nunavut",
  ON: "ontario",
  PE: "prince edward island",
  QC: "quebec",
  SK: "saskatchewan",
  YT: "yukon",
};

/** Two-letter province code when recognised; otherwise the cleaned text. */
export function coerceProvince(value: unknown): string | null {
  const raw = coerceText(value);
  if (!raw) return null;
  const upper = raw.toUpperCase().replace(/\./g, "");
  if (upper in PROVINCE_NAMES) return upper;
  const lower = raw
    .toLowerCase()
    .normalize("NFD")
    .replace(/\p{M}/gu, "")
    .replace(/\s+/g, " ");
  const code = Object.keys(PROVINCE_NAMES).find((k) => PROVINCE_NAMES[k] === lower);
  return code ?? raw;
}

// ---------------------------------------------------------------------------
// String lists
// ---------------------------------------------------------------------------

export function coerceStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const seen = new Set<string>();
  for (const item of value) {
    const text = coerceText(item);
    if (text) seen.add(text);
  }
  return [...seen];
}
