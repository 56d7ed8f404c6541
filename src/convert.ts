import type { AppConfig } from "./config.js";
import { findDuplicateIds } from "./ids.js";
import { readRecordsFromCsv } from "./io.js";
import { createOfxRenderer } from "./ofx.js";
import { parseInvestmentCsv } from "./parsers/investment-csv.js";
import type { Transaction } from "./schema.js";

export type ConvertOptions = AppConfig & {
  file?: string;
  clock?: () => Date;
};

export type StatementResult = {
  ofx: string;
  transactions: readonly Transaction[];
  /** FITIDs shared by several transactions; rendered anyway. */
  duplicateIds: string[];
};

export function parseCsvText(
  raw: string,
  opts: Pick<ConvertOptions, "delimiter" | "skipLines" | "file">
): Transaction[] {
  const records = readRecordsFromCsv(raw, { delimiter: opts.delimiter });
  return parseInvestmentCsv(records, { file: opts.file, skipLines: opts.skipLines });
}

export function renderStatement(
  transactions: readonly Transaction[],
  opts: Pick<ConvertOptions, "brokerId" | "accountId" | "currency" | "clock">
): StatementResult {
  const ofx = createOfxRenderer(opts).render(transactions);
  return { ofx, transactions, duplicateIds: findDuplicateIds(transactions) };
}

/** CSV text in, OFX document out. Throws before producing any output. */
export function convertCsvToOfx(raw: string, opts: ConvertOptions): StatementResult {
  return renderStatement(parseCsvText(raw, opts), opts);
}
