import { z } from "zod";
import { StatementError } from "./errors.js";

export type AppConfig = {
  brokerId: string;
  accountId: string;
  currency: string;
  delimiter: string;
  skipLines: number;
};

const EnvSchema = z.object({
  STATEMENT_OFX_BROKER_ID: z.string().min(1).default("statement-ofx"),
  STATEMENT_OFX_ACCOUNT_ID: z.string().min(1).default("INVESTMENT"),
  STATEMENT_OFX_CURRENCY: z
    .string()
    .regex(/^[A-Z]{3}$/, "expected a 3-letter currency code")
    .default("USD"),
  STATEMENT_OFX_DELIMITER: z.string().length(1, "expected a single character").default(","),
  STATEMENT_OFX_SKIP_LINES: z
    .string()
    .regex(/^\d+$/, "expected a non-negative integer")
    .transform(Number)
    .default("2")
});

/**
 * Defaults for the CLI, overridable through STATEMENT_OFX_* variables.
 * Command-line flags take precedence over whatever this returns.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new StatementError("InvalidConfig", `Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    brokerId: e.STATEMENT_OFX_BROKER_ID,
    accountId: e.STATEMENT_OFX_ACCOUNT_ID,
    currency: e.STATEMENT_OFX_CURRENCY,
    delimiter: e.STATEMENT_OFX_DELIMITER,
    skipLines: e.STATEMENT_OFX_SKIP_LINES
  };
}

/** Merges CLI flags (as commander hands them over) onto the loaded config. */
export function resolveConfig(base: AppConfig, flags: Partial<Record<keyof AppConfig, string>>): AppConfig {
  const merged = {
    STATEMENT_OFX_BROKER_ID: flags.brokerId ?? base.brokerId,
    STATEMENT_OFX_ACCOUNT_ID: flags.accountId ?? base.accountId,
    STATEMENT_OFX_CURRENCY: flags.currency ?? base.currency,
    STATEMENT_OFX_DELIMITER: flags.delimiter ?? base.delimiter,
    STATEMENT_OFX_SKIP_LINES: flags.skipLines ?? String(base.skipLines)
  };
  return loadConfig(merged);
}
