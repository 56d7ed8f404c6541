import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseCsv } from "csv-parse/sync";
import { z } from "zod";
import { TransactionsFileSchema, type Transaction } from "./schema.js";

const RecordsSchema = z.array(z.array(z.string()));

/**
 * Reads the whole input: a file path, or stdin when the path is absent or "-".
 */
export async function readInputText(
  filePath: string | undefined,
  stdin: AsyncIterable<string | Buffer> = process.stdin
): Promise<string> {
  if (filePath && filePath !== "-") return fs.readFile(filePath, "utf8");

  // Decode once: a multi-byte character may straddle two chunks.
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  return Buffer.concat(chunks).toString("utf8");
}

/** Tokenizes delimited text into rows of fields, without header handling. */
export function readRecordsFromCsv(raw: string, opts: { delimiter?: string } = {}): string[][] {
  const records: unknown = parseCsv(raw, {
    delimiter: opts.delimiter ?? ",",
    skip_empty_lines: true,
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    trim: true
  });
  return RecordsSchema.parse(records);
}

export async function readTransactionsFile(filePath: string): Promise<Transaction[]> {
  const raw = await fs.readFile(filePath, "utf8");
  const json: unknown = JSON.parse(raw);
  const parsed = TransactionsFileSchema.parse(json);
  return parsed.transactions;
}

export async function ensureDirForFile(filePath: string) {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
}

export async function writeJson(filePath: string, data: unknown) {
  await ensureDirForFile(filePath);
  await fs.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
}

export async function writeText(filePath: string, text: string) {
  await ensureDirForFile(filePath);
  await fs.writeFile(filePath, text, "utf8");
}
