import crypto from "node:crypto";
import type { Transaction } from "./schema.js";

export type UniqueIdInput = Pick<Transaction, "kind" | "date" | "amount" | "security" | "quantity">;

/**
 * Deterministic FITID for a transaction.
 *
 * sha256 over `kind|date|amount|security|quantity` (in that order, ISO date).
 * Description is not part of the key: rows that differ only in description
 * share an id.
 */
export function deriveUniqueId(tx: UniqueIdInput): string {
  const serialized = [tx.kind, tx.date, tx.amount, tx.security, tx.quantity].join("|");
  return crypto.createHash("sha256").update(serialized, "utf8").digest("hex");
}

/** Ids that occur more than once, in order of first repeat. */
export function findDuplicateIds(transactions: readonly Transaction[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();

  for (const tx of transactions) {
    if (seen.has(tx.uniqueId)) {
      dupes.add(tx.uniqueId);
      continue;
    }
    seen.add(tx.uniqueId);
  }

  return Array.from(dupes);
}
