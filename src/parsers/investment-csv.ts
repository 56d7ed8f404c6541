import { StatementError } from "../errors.js";
import { deriveUniqueId } from "../ids.js";
import { normalizeAmount, normalizeDate } from "../normalize.js";
import type { Transaction, TransactionKind } from "../schema.js";

/**
 * Investment account export (retirement plan / brokerage style).
 * Observed layout:
 *  - two banner rows (plan name, account summary)
 *  - header row: Category, Date, Description, Amount, Fund, Shares
 *  - one row per transaction
 */
export type InvestmentCsvOptions = {
  file?: string;
  /** Banner rows before the header. Default: 2 */
  skipLines?: number;
};

const ID_COLUMNS = ["Transaction ID", "FITID", "ID"];

const CATEGORY_KINDS = new Map<string, Exclude<TransactionKind, "UNKNOWN">>([
  ["BUY", "BUY"],
  ["SELL", "SELL"],
  ["DIVIDEND", "DIVIDEND"]
]);

export function parseInvestmentCsv(records: string[][], opts: InvestmentCsvOptions = {}): Transaction[] {
  const skipLines = opts.skipLines ?? 2;
  const header = records[skipLines];
  if (!header) return [];

  const headerRow = skipLines + 1;
  const col = {
    category: requireColumn(header, "Category", headerRow),
    date: requireColumn(header, "Date", headerRow),
    description: requireColumn(header, "Description", headerRow),
    amount: requireColumn(header, "Amount", headerRow),
    security: requireColumn(header, "Fund", headerRow),
    quantity: requireColumn(header, "Shares", headerRow)
  };
  const idCol = ID_COLUMNS.map((c) => header.indexOf(c)).find((i) => i >= 0);

  const out: Transaction[] = [];

  for (let i = skipLines + 1; i < records.length; i++) {
    const r = records[i];
    const rowNo = i + 1;

    if (r.every((v) => v === "")) continue;

    const field = (idx: number) => r[idx] ?? "";

    const categoryRaw = field(col.category);
    const kind = CATEGORY_KINDS.get(categoryRaw.trim().toUpperCase());
    if (!kind) {
      throw new StatementError("UnknownCategory", `Unknown transaction category: '${categoryRaw}'`, { row: rowNo });
    }

    const base = {
      kind,
      date: normalizeDate(field(col.date), rowNo),
      amount: normalizeAmount(field(col.amount), rowNo),
      security: field(col.security),
      quantity: field(col.quantity)
    };
    const suppliedId = idCol != null ? field(idCol) : "";

    out.push(
      Object.freeze({
        ...base,
        description: field(col.description),
        uniqueId: suppliedId !== "" ? suppliedId : deriveUniqueId(base),
        source: { file: opts.file, row: rowNo, raw: toRawObject(header, r) }
      })
    );
  }

  return out;
}

function requireColumn(header: string[], name: string, row: number): number {
  const idx = header.indexOf(name);
  if (idx < 0) {
    throw new StatementError("MissingColumn", `Investment CSV: required column '${name}' not found`, { row });
  }
  return idx;
}

function toRawObject(header: string[], r: string[]): Record<string, string> {
  const o: Record<string, string> = {};
  for (let i = 0; i < Math.min(header.length, r.length); i++) o[header[i]] = r[i];
  return o;
}
