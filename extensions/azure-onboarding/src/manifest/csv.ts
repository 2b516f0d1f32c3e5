/**
 * Minimal RFC 4180 CSV reader/writer.
 *
 * Comma delimiter, `"` quoting with `""` escapes, LF or CRLF line endings.
 */

export type CsvRecord = {
  /** 1-based line on which the record starts. */
  line: number;
  fields: string[];
};

/** Escape a CSV field value. */
export function csvEscape(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(fields: string[]): string {
  return fields.map(csvEscape).join(",");
}

/**
 * Parse CSV text into records. Blank lines produce no record. A leading
 * UTF-8 byte order mark is dropped.
 */
export function parseCsv(text: string): CsvRecord[] {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records: CsvRecord[] = [];

  let fields: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let sawContent = false;

  const endRecord = () => {
    if (sawContent) {
      fields.push(field);
      records.push({ line: recordLine, fields });
    }
    fields = [];
    field = "";
    sawContent = false;
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === "\n") line++;
        field += ch;
      }
      continue;
    }

    switch (ch) {
      case '"':
        if (!sawContent) recordLine = line;
        sawContent = true;
        inQuotes = true;
        break;
      case ",":
        if (!sawContent) recordLine = line;
        sawContent = true;
        fields.push(field);
        field = "";
        break;
      case "\r":
        if (input[i + 1] !== "\n") {
          endRecord();
          line++;
        }
        break;
      case "\n":
        endRecord();
        line++;
        break;
      default:
        if (!sawContent) recordLine = line;
        sawContent = true;
        field += ch;
    }
  }
  endRecord();

  return records;
}
