import { Command, CommanderError } from "commander";
import chalk from "chalk";

import { loadConfig, resolveConfig, type AppConfig } from "./config.js";
import { convertCsvToOfx, parseCsvText, renderStatement, type StatementResult } from "./convert.js";
import { isStatementError } from "./errors.js";
import { readInputText, readTransactionsFile, writeJson, writeText } from "./io.js";
import { TransactionsFileSchema } from "./schema.js";

const VERSION = "0.1.0";
const TOOL = `statement-ofx@${VERSION}`;

type CsvFlags = Partial<Record<keyof AppConfig, string>> & { out?: string };

/** Process streams and environment the program talks to. */
export type CliIo = {
  stdin: AsyncIterable<string | Buffer>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
};

const processIo: CliIo = {
  stdin: process.stdin,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env
};

function withCsvOptions(cmd: Command): Command {
  return cmd
    .option("--delimiter <char>", "Field delimiter (default: ,)")
    .option("--skip-lines <n>", "Banner rows before the header row (default: 2)");
}

function withAccountOptions(cmd: Command): Command {
  return cmd
    .option("--broker-id <id>", "BROKERID written to the statement")
    .option("--account-id <id>", "ACCTID written to the statement")
    .option("--currency <code>", "CURDEF written to the statement (default: USD)");
}

function inputFile(input: string | undefined): string | undefined {
  return input && input !== "-" ? input : undefined;
}

export function buildProgram(io: CliIo = processIo): Command {
  const log = (line: string) => io.stderr(line + "\n");

  async function emitOfx(result: StatementResult, out: string | undefined) {
    const { ofx, transactions, duplicateIds } = result;
    if (duplicateIds.length > 0) {
      log(chalk.yellow(`Warning: ${duplicateIds.length} FITID(s) shared by more than one transaction`));
    }

    if (out) {
      await writeText(out, ofx);
      log(chalk.green(`OK: wrote ${transactions.length} transactions -> ${out}`));
    } else {
      io.stdout(ofx);
    }
  }

  const program = new Command();

  // Set before adding commands so subcommands inherit them.
  program
    .name("statement-ofx")
    .description("Convert investment transaction CSV exports into OFX statements.")
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  withAccountOptions(
    withCsvOptions(
      program
        .command("convert")
        .description("Convert a CSV export (file or stdin) into an OFX statement.")
        .argument("[input]", "Input CSV path; omit or '-' for stdin")
        .option("-o, --out <path>", "Output OFX path (default: stdout)")
    )
  ).action(async (input: string | undefined, opts: CsvFlags) => {
    const config = resolveConfig(loadConfig(io.env), opts);
    const raw = await readInputText(input, io.stdin);
    await emitOfx(convertCsvToOfx(raw, { ...config, file: inputFile(input) }), opts.out);
  });

  withCsvOptions(
    program
      .command("parse")
      .description("Parse a CSV export into normalized JSON.")
      .argument("[input]", "Input CSV path; omit or '-' for stdin")
      .option("-o, --out <path>", "Output JSON path", "./out/transactions.json")
  ).action(async (input: string | undefined, opts: CsvFlags) => {
    const config = resolveConfig(loadConfig(io.env), opts);
    const raw = await readInputText(input, io.stdin);
    const transactions = parseCsvText(raw, { ...config, file: inputFile(input) });

    const out = {
      version: 1 as const,
      generatedAt: new Date().toISOString(),
      tool: TOOL,
      transactions
    };

    // Validate before writing.
    const parsed = TransactionsFileSchema.parse(out);
    const outPath = opts.out ?? "./out/transactions.json";
    await writeJson(outPath, parsed);

    log(chalk.green(`OK: wrote ${transactions.length} transactions -> ${outPath}`));
  });

  withAccountOptions(
    program
      .command("render")
      .description("Render a normalized JSON file (from `parse`) as an OFX statement.")
      .argument("<input>", "Input normalized JSON")
      .option("-o, --out <path>", "Output OFX path (default: stdout)")
  ).action(async (input: string, opts: CsvFlags) => {
    const config = resolveConfig(loadConfig(io.env), opts);
    const transactions = await readTransactionsFile(input);
    await emitOfx(renderStatement(transactions, config), opts.out);
  });

  program
    .command("schema")
    .description("Print the expected CSV layout.")
    .action(() => {
      io.stdout(
        [
          "Input is a delimited text table:",
          "- rows 1-2: banner rows (ignored; see --skip-lines)",
          "- row 3: header naming at least Category, Date, Description, Amount, Fund, Shares",
          "- optional id column: Transaction ID | FITID | ID (otherwise a sha256 id is derived)",
          "Fields:",
          "- Category: Buy | Sell | Dividend (case-insensitive)",
          "- Date: MM/DD/YYYY",
          "- Amount: decimal, optional leading currency symbol, thousands separators allowed",
          "- Fund: security id, written as a CUSIP",
          "- Shares: unit count, copied verbatim"
        ].join("\n") + "\n"
      );
    });

  return program;
}

/**
 * Runs one command line (without the node/script prefix) and returns the exit code.
 * Failures are reported on stderr; nothing reaches stdout unless the command succeeds.
 */
export async function runCli(argv: string[], io: CliIo = processIo): Promise<number> {
  try {
    await buildProgram(io).parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    // commander already printed its own usage message (or help/version).
    if (err instanceof CommanderError) return err.exitCode;

    if (isStatementError(err)) {
      io.stderr(chalk.red(`${err.code}: ${err.message}`) + "\n");
    } else if (err instanceof Error) {
      io.stderr(chalk.red(err.stack ?? err.message) + "\n");
    } else {
      io.stderr(chalk.red(String(err)) + "\n");
    }
    return 1;
  }
}
