import { describe, it, expect } from "vitest";
import { csvEscape, formatCsvRow, parseCsv } from "./csv.js";

describe("parseCsv", () => {
  it("splits simple rows and tracks line numbers", () => {
    expect(parseCsv("a,b,c\nd,e,f\n")).toEqual([
      { line: 1, fields: ["a", "b", "c"] },
      { line: 2, fields: ["d", "e", "f"] },
    ]);
  });

  it("handles CRLF line endings and a byte order mark", () => {
    expect(parseCsv("\uFEFFa,b\r\nc,d\r\n")).toEqual([
      { line: 1, fields: ["a", "b"] },
      { line: 2, fields: ["c", "d"] },
    ]);
  });

  it("skips blank lines but keeps counting them", () => {
    expect(parseCsv("a\n\n\nb")).toEqual([
      { line: 1, fields: ["a"] },
      { line: 4, fields: ["b"] },
    ]);
  });

  it("reads quoted fields with commas, escaped quotes and newlines", () => {
    const records = parseCsv('"Storage Blob Data Contributor","say ""hi""","x,y"\n"multi\nline",z\n');
    expect(records).toEqual([
      { line: 1, fields: ["Storage Blob Data Contributor", 'say "hi"', "x,y"] },
      { line: 2, fields: ["multi\nline", "z"] },
    ]);
  });

  it("keeps empty trailing fields", () => {
    expect(parseCsv("ResourceGroup,RG1,Contributor,")).toEqual([
      { line: 1, fields: ["ResourceGroup", "RG1", "Contributor", ""] },
    ]);
  });
});

describe("csvEscape / formatCsvRow", () => {
  it("quotes only when needed", () => {
    expect(csvEscape("plain")).toBe("plain");
    expect(csvEscape("a,b")).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
  });

  it("joins escaped fields", () => {
    expect(formatCsvRow(["a", "b,c", ""])).toBe('a,"b,c",');
  });
});
