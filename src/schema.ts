import { z } from "zod";

export const TransactionKindSchema = z.enum(["BUY", "SELL", "DIVIDEND", "UNKNOWN"]);

/** Signed decimal numeral without currency symbols or separators. */
export const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Core schema for one investment transaction row.
 * Amount and quantity stay text so the statement reproduces them exactly.
 */
export const TransactionSchema = z
  .object({
    kind: TransactionKindSchema,
    /** ISO date (YYYY-MM-DD), no time of day. */
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    description: z.string(),
    amount: z.string().regex(DECIMAL_RE),
    /** Fund / security identifier, written out as a CUSIP. */
    security: z.string(),
    quantity: z.string(),
    uniqueId: z.string().min(1),

    /** Raw row reference for traceability. */
    source: z
      .object({
        file: z.string().optional(),
        row: z.number().int().positive().optional(),
        raw: z.record(z.string()).optional()
      })
      .optional()
  })
  .readonly();

export const TransactionsFileSchema = z.object({
  version: z.literal(1),
  generatedAt: z.string(),
  tool: z.string(),
  transactions: z.array(TransactionSchema)
});

export type TransactionKind = z.infer<typeof TransactionKindSchema>;
export type Transaction = z.infer<typeof TransactionSchema>;
export type TransactionsFile = z.infer<typeof TransactionsFileSchema>;
