import { StatementError } from "./errors.js";
import { negateAmount } from "./normalize.js";
import type { Transaction } from "./schema.js";

export type OfxRendererOptions = {
  brokerId: string;
  accountId: string;
  /** Default: USD */
  currency?: string;
  /** Source of "now" for DTSERVER / DTASOF. */
  clock?: () => Date;
};

export type OfxRenderer = {
  render(transactions: readonly Transaction[]): string;
};

/** Values substituted into a record template. */
type RecordFields = {
  fitId: string;
  dtTrade: string;
  memo: string;
  secId: string;
  units: string;
  total: string;
};

type RecordTemplate = (f: RecordFields) => string[];

const INDENT = "  ";

function invTran(f: RecordFields): string[] {
  return [
    "<INVTRAN>",
    `${INDENT}<FITID>${f.fitId}</FITID>`,
    `${INDENT}<DTTRADE>${f.dtTrade}</DTTRADE>`,
    `${INDENT}<MEMO>${f.memo}</MEMO>`,
    "</INVTRAN>"
  ];
}

function secId(f: RecordFields): string {
  return `<SECID><UNIQUEID>${f.secId}</UNIQUEID><UNIQUEIDTYPE>CUSIP</UNIQUEIDTYPE></SECID>`;
}

const TEMPLATES = Object.freeze({
  BUY: (f: RecordFields) => [
    "<BUYSTOCK>",
    `${INDENT}<INVBUY>`,
    ...indent([...invTran(f), secId(f), `<UNITS>${f.units}</UNITS>`, `<TOTAL>${f.total}</TOTAL>`], 2),
    `${INDENT}${INDENT}<SUBACCTSEC>CASH</SUBACCTSEC>`,
    `${INDENT}${INDENT}<SUBACCTFUND>CASH</SUBACCTFUND>`,
    `${INDENT}</INVBUY>`,
    `${INDENT}<BUYTYPE>BUY</BUYTYPE>`,
    "</BUYSTOCK>"
  ],
  SELL: (f: RecordFields) => [
    "<SELLSTOCK>",
    `${INDENT}<INVSELL>`,
    ...indent([...invTran(f), secId(f), `<UNITS>${f.units}</UNITS>`, `<TOTAL>${f.total}</TOTAL>`], 2),
    `${INDENT}${INDENT}<SUBACCTSEC>CASH</SUBACCTSEC>`,
    `${INDENT}${INDENT}<SUBACCTFUND>CASH</SUBACCTFUND>`,
    `${INDENT}</INVSELL>`,
    `${INDENT}<SELLTYPE>SELL</SELLTYPE>`,
    "</SELLSTOCK>"
  ],
  DIVIDEND: (f: RecordFields) => [
    "<REINVEST>",
    ...indent(
      [
        ...invTran(f),
        secId(f),
        "<INCOMETYPE>DIV</INCOMETYPE>",
        `<TOTAL>${f.total}</TOTAL>`,
        "<SUBACCTSEC>CASH</SUBACCTSEC>",
        `<UNITS>${f.units}</UNITS>`
      ],
      1
    ),
    "</REINVEST>"
  ]
} satisfies Record<"BUY" | "SELL" | "DIVIDEND", RecordTemplate>);

export function createOfxRenderer(opts: OfxRendererOptions): OfxRenderer {
  const currency = opts.currency ?? "USD";
  const clock = opts.clock ?? (() => new Date());
  const brokerId = escapeSgml(opts.brokerId);
  const accountId = escapeSgml(opts.accountId);

  return {
    render(transactions) {
      if (transactions.length === 0) {
        throw new StatementError("EmptyStatement", "No transactions to render");
      }

      const records = transactions.flatMap(renderRecord);

      // ISO dates compare correctly as strings.
      let start = transactions[0].date;
      let end = transactions[0].date;
      for (const tx of transactions) {
        if (tx.date < start) start = tx.date;
        if (tx.date > end) end = tx.date;
      }
      const now = formatOfxDateTime(clock());

      const status = ["<STATUS>", `${INDENT}<CODE>0</CODE>`, `${INDENT}<SEVERITY>INFO</SEVERITY>`, "</STATUS>"];

      const body = [
        "<SIGNONMSGSRSV1>",
        ...indent(["<SONRS>", ...indent([...status, `<DTSERVER>${now}</DTSERVER>`, "<LANGUAGE>ENG</LANGUAGE>"], 1), "</SONRS>"], 1),
        "</SIGNONMSGSRSV1>",
        "<INVSTMTMSGSRSV1>",
        ...indent(
          [
            "<INVSTMTTRNRS>",
            ...indent(
              [
                "<TRNUID>0</TRNUID>",
                ...status,
                "<INVSTMTRS>",
                ...indent(
                  [
                    `<DTASOF>${now}</DTASOF>`,
                    `<CURDEF>${currency}</CURDEF>`,
                    "<INVACCTFROM>",
                    `${INDENT}<BROKERID>${brokerId}</BROKERID>`,
                    `${INDENT}<ACCTID>${accountId}</ACCTID>`,
                    "</INVACCTFROM>",
                    `<INVTRANLIST><DTSTART>${formatOfxDate(start)}</DTSTART><DTEND>${formatOfxDate(end)}</DTEND>`,
                    ...indent(records, 1),
                    "</INVTRANLIST>"
                  ],
                  1
                ),
                "</INVSTMTRS>"
              ],
              1
            ),
            "</INVSTMTTRNRS>"
          ],
          1
        ),
        "</INVSTMTMSGSRSV1>"
      ];

      return ["DATA:OFXSGML", "ENCODING:UTF-8", "<OFX>", ...indent(body, 1), "</OFX>"].join("\n") + "\n";
    }
  };
}

export function renderRecord(tx: Transaction): string[] {
  const fields = (total: string): RecordFields => ({
    fitId: escapeSgml(tx.uniqueId),
    dtTrade: formatOfxDate(tx.date),
    memo: escapeSgml(tx.description),
    secId: escapeSgml(tx.security),
    units: escapeSgml(tx.quantity),
    total
  });

  switch (tx.kind) {
    case "BUY":
      // Cash leaves the account to acquire shares.
      return TEMPLATES.BUY(fields(negateAmount(tx.amount)));
    case "SELL":
      return TEMPLATES.SELL(fields(tx.amount));
    case "DIVIDEND":
      return TEMPLATES.DIVIDEND(fields(tx.amount));
    case "UNKNOWN":
      throw new StatementError("UnsupportedTransactionKind", `No OFX record for kind ${tx.kind}`, {
        row: tx.source?.row
      });
    default: {
      const unreachable: never = tx.kind;
      throw new StatementError("UnsupportedTransactionKind", `No OFX record for kind ${String(unreachable)}`);
    }
  }
}

/** ISO date (YYYY-MM-DD) -> YYYYMMDD000000. */
export function formatOfxDate(isoDate: string): string {
  return `${isoDate.replace(/-/g, "")}000000`;
}

/** Local wall-clock time as YYYYMMDDhhmmss. */
export function formatOfxDateTime(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return (
    String(d.getFullYear()).padStart(4, "0") +
    p(d.getMonth() + 1) +
    p(d.getDate()) +
    p(d.getHours()) +
    p(d.getMinutes()) +
    p(d.getSeconds())
  );
}

export function escapeSgml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function indent(lines: string[], depth: number): string[] {
  const pad = INDENT.repeat(depth);
  return lines.map((l) => pad + l);
}
