import { describe, expect, it } from "vitest";
import { parseStockCsv, readSource } from "../src/csv";
import { SourceFormatError, SourceUnavailableError } from "../src/errors";

describe("parseStockCsv", () => {
  it("maps rows by header name and ignores extra columns", () => {
    const text = [
      "Ticker, Date ,Open,High,Low,Close,Volume,Note",
      "AAPL,2023-01-02,1,2,0.5,1.5,100,first",
      "",
      "MSFT,2023-01-02,3,4,2.5,3.5,200,second"
    ].join("\n");

    expect(parseStockCsv(text)).toEqual([
      { Date: "2023-01-02", Ticker: "AAPL", Open: "1", High: "2", Low: "0.5", Close: "1.5", Volume: "100" },
      { Date: "2023-01-02", Ticker: "MSFT", Open: "3", High: "4", Low: "2.5", Close: "3.5", Volume: "200" }
    ]);
  });

  it("leaves missing trailing fields undefined", () => {
    const rows = parseStockCsv("Date,Ticker,Open,High,Low,Close,Volume\n2023-01-02,AAPL,1,2\n");
    expect(rows).toEqual([
      {
        Date: "2023-01-02",
        Ticker: "AAPL",
        Open: "1",
        High: "2",
        Low: undefined,
        Close: undefined,
        Volume: undefined
      }
    ]);
  });

  it("returns no rows for a header-only file", () => {
    expect(parseStockCsv("Date,Ticker,Open,High,Low,Close,Volume\n")).toEqual([]);
  });

  it("lists missing required columns", () => {
    let caught: unknown;
    try {
      parseStockCsv("Date,Ticker,Open,Close\n2023-01-02,AAPL,1,2\n");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SourceFormatError);
    if (caught instanceof SourceFormatError) {
      expect(caught.missing).toEqual(["High", "Low", "Volume"]);
      expect(caught.message).toBe("Missing required columns: High, Low, Volume");
    }
  });

  it("treats an empty file as missing every column", () => {
    expect(() => parseStockCsv("")).toThrow(
      "Missing required columns: Date, Ticker, Open, High, Low, Close, Volume"
    );
  });

  it("reports unterminated quotes as a format error", () => {
    expect(() => parseStockCsv('Date,Ticker,Open,High,Low,Close,Volume\n"2023-01-02,AAPL')).toThrow(
      SourceFormatError
    );
  });
});

describe("readSource", () => {
  it("raises SourceUnavailableError for a missing file", () => {
    expect(() => readSource("/definitely/not/here/stocks.csv")).toThrow(SourceUnavailableError);
  });
});
