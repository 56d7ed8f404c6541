import { StatementError } from "./errors.js";
import { DECIMAL_RE } from "./schema.js";

/**
 * MM/DD/YYYY -> YYYY-MM-DD.
 * Single-digit month/day are accepted; the date must exist on the calendar.
 */
export function normalizeDate(s: string, row?: number): string {
  const m = s.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (!m) throw new StatementError("MalformedDate", `Unsupported date format: ${s}`, { row });

  const month = Number(m[1]);
  const day = Number(m[2]);
  const year = Number(m[3]);

  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    throw new StatementError("MalformedDate", `Not a calendar date: ${s}`, { row });
  }

  return `${m[3]}-${m[1].padStart(2, "0")}-${m[2].padStart(2, "0")}`;
}

/**
 * Strips one leading currency symbol and every thousands separator.
 * "(12.50)" is read as "-12.50".
 */
export function normalizeAmount(s: string, row?: number): string {
  let cleaned = s.trim().replace(/^\((.*)\)$/, "-$1");
  cleaned = cleaned.replace(/^([+-]?)\s*[$€£¥￥]/, "$1").replace(/,/g, "").trim();

  if (!DECIMAL_RE.test(cleaned)) {
    throw new StatementError("MalformedAmount", `Unsupported amount: ${s}`, { row });
  }
  return cleaned;
}

/** Flips the sign of a decimal string without going through floating point. */
export function negateAmount(amount: string): string {
  if (/^[+-]?0*\.?0*$/.test(amount)) return amount;
  if (amount.startsWith("-")) return amount.slice(1);
  if (amount.startsWith("+")) return `-${amount.slice(1)}`;
  return `-${amount}`;
}
