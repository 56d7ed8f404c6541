import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { convertCsvToOfx, parseCsvText, renderStatement } from "./convert.js";
import { isStatementError } from "./errors.js";

const config = {
  ...loadConfig({}),
  brokerId: "example-broker",
  accountId: "ACCT-1",
  clock: () => new Date(2024, 0, 15, 12, 0, 0)
};

function statement(...rows: string[]): string {
  return ["Example Retirement Plan", "Balances as of 03/31/2023", "Category,Date,Description,Amount,Fund,Shares", ...rows].join(
    "\n"
  );
}

describe("convertCsvToOfx", () => {
  it("converts a single purchase", () => {
    const { ofx, transactions } = convertCsvToOfx(statement("Buy,01/02/2023,Fund purchase,$100.00,ABC123,5"), config);

    expect(transactions).toHaveLength(1);
    expect(ofx.match(/<BUYSTOCK>/g)).toHaveLength(1);
    expect(ofx).toContain("<TOTAL>-100.00</TOTAL>");
    expect(ofx).toContain("<UNITS>5</UNITS>");
    expect(ofx).toContain("<DTTRADE>20230102000000</DTTRADE>");
    expect(ofx).toContain("<MEMO>Fund purchase</MEMO>");
    expect(ofx).toContain("<SECID><UNIQUEID>ABC123</UNIQUEID><UNIQUEIDTYPE>CUSIP</UNIQUEIDTYPE></SECID>");
    expect(ofx).toContain("<DTASOF>20240115120000</DTASOF>");
  });

  it("negates buys but not sells", () => {
    const { ofx } = convertCsvToOfx(
      statement("Sell,01/02/2023,Sale,50.00,ABC123,1", "Buy,01/03/2023,Purchase,50.00,ABC123,1"),
      config
    );
    const totals = ofx.match(/<TOTAL>[^<]*<\/TOTAL>/g);
    expect(totals).toEqual(["<TOTAL>50.00</TOTAL>", "<TOTAL>-50.00</TOTAL>"]);
  });

  it("covers the full date range in either input order", () => {
    const range = "<DTSTART>20230101000000</DTSTART><DTEND>20230301000000</DTEND>";
    const early = "Dividend,01/01/2023,Dividend,1.00,ABC123,0.1";
    const late = "Dividend,03/01/2023,Dividend,2.00,ABC123,0.2";

    expect(convertCsvToOfx(statement(early, late), config).ofx).toContain(range);
    expect(convertCsvToOfx(statement(late, early), config).ofx).toContain(range);
  });

  it("aborts on an unknown category before producing output", () => {
    let result: unknown;
    let code: string | undefined;
    try {
      result = convertCsvToOfx(
        statement("Buy,01/02/2023,Fund purchase,$100.00,ABC123,5", "Transfer,01/03/2023,Move,$10.00,ABC123,1"),
        config
      );
    } catch (err) {
      code = isStatementError(err) ? err.code : undefined;
    }
    expect(code).toBe("UnknownCategory");
    expect(result).toBeUndefined();
  });

  it("refuses a statement with no transactions", () => {
    expect(() => convertCsvToOfx(statement(), config)).toThrow("No transactions to render");
  });

  it("reports ids shared by otherwise identical rows", () => {
    const { duplicateIds, ofx } = convertCsvToOfx(
      statement("Buy,01/02/2023,First,$100.00,ABC123,5", "Buy,01/02/2023,Second,$100.00,ABC123,5"),
      config
    );
    expect(duplicateIds).toHaveLength(1);
    expect(ofx.match(/<BUYSTOCK>/g)).toHaveLength(2);
  });

  it("honours the delimiter", () => {
    const raw = ["banner", "banner", "Category;Date;Description;Amount;Fund;Shares", "Sell;01/02/2023;Sale;$1.234,00;X;1"].join(
      "\n"
    );
    // Commas are thousands separators, so "$1.234,00" normalizes to "1.23400".
    const txs = parseCsvText(raw, { ...config, delimiter: ";" });
    expect(txs[0].amount).toBe("1.23400");
  });
});

describe("renderStatement", () => {
  it("renders already-parsed transactions", () => {
    const txs = parseCsvText(statement("Dividend,02/01/2023,Reinvested,12.34,ABC123,0.5"), config);
    const { ofx, duplicateIds } = renderStatement(txs, config);
    expect(duplicateIds).toEqual([]);
    expect(ofx).toContain("<INCOMETYPE>DIV</INCOMETYPE>");
    expect(ofx).toContain("<TOTAL>12.34</TOTAL>");
  });
});
