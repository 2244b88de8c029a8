/**
 * SERIAL CODE PARSER
 *
 * Device serials encode the manufacture month and two-digit year in their
 * leading digits (MMYY + sequence with the default rules). Validation always
 * returns a tagged result; an invalid serial stays in the data set.
 */

import type { CellValue, SerialCodeRules } from "@shared/schema";
import type { SerialCode, SerialInvalidReason, SerialReport } from "../lifecycleContract";

// Decorative glyphs that show up in hand-keyed serials.
const DIGIT_GLYPHS: Record<string, string> = {
  "⁰": "0", "¹": "1", "²": "2", "³": "3", "⁴": "4",
  "⁵": "5", "⁶": "6", "⁷": "7", "⁸": "8", "⁹": "9",
  "₀": "0", "₁": "1", "₂": "2", "₃": "3", "₄": "4",
  "₅": "5", "₆": "6", "₇": "7", "₈": "8", "₉": "9",
};

export function normalizeSerialGlyphs(value: string): string {
  return Array.from(value, (c) => DIGIT_GLYPHS[c] ?? c).join("");
}

function serialText(value: CellValue, rules: SerialCodeRules): string {
  if (value === null) return "";
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    const text = String(value);
    return rules.padNumeric ? text.padStart(rules.length, "0") : text;
  }
  return String(value);
}

function invalid(
  raw: string,
  normalizedDigits: string,
  reason: SerialInvalidReason,
  codes: { monthCode: number | null; yearCode: number | null; sequence: string | null }
): SerialCode {
  return {
    raw,
    normalizedDigits,
    ...codes,
    validity: { status: "invalid", reason },
    derivedFabricationDate: null,
  };
}

export function parseSerialCode(value: CellValue, rules: SerialCodeRules): SerialCode {
  const raw = value === null ? "" : String(value);
  const digits = normalizeSerialGlyphs(serialText(value, rules)).trim();

  if (digits.length !== rules.length || !/^\d+$/.test(digits)) {
    return invalid(raw, digits, "length", { monthCode: null, yearCode: null, sequence: null });
  }

  const [monthStart, monthEnd] = rules.monthDigits;
  const [yearStart, yearEnd] = rules.yearDigits;
  const monthCode = Number(digits.slice(monthStart, monthEnd));
  const yearCode = Number(digits.slice(yearStart, yearEnd));
  const sequence = Array.from(digits)
    .filter((_, i) => !(i >= monthStart && i < monthEnd) && !(i >= yearStart && i < yearEnd))
    .join("");
  const codes = { monthCode, yearCode, sequence };

  if (monthCode < 1 || monthCode > 12) {
    return invalid(raw, digits, "month", codes);
  }
  if (yearCode < rules.yearWindow.min || yearCode > rules.yearWindow.max) {
    return invalid(raw, digits, "year-window", codes);
  }

  const year = rules.century + yearCode;
  return {
    raw,
    normalizedDigits: digits,
    ...codes,
    validity: { status: "valid" },
    derivedFabricationDate: `${year}-${String(monthCode).padStart(2, "0")}-01`,
  };
}

export function summarizeSerialCodes(codes: SerialCode[]): SerialReport {
  const report: SerialReport = { valid: 0, invalid: { length: 0, month: 0, "year-window": 0 } };
  for (const code of codes) {
    if (code.validity.status === "valid") {
      report.valid++;
    } else {
      report.invalid[code.validity.reason]++;
    }
  }
  return report;
}
