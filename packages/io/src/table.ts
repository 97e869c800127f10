/**
 * Delimited text tables (TSV/CSV) with RFC 4180 style quoting.
 */

import { extname } from "node:path";

import { InputSchemaError } from "@pequant/errors";

export interface TableRow {
  /** 1-based line on which the row starts (the header is line 1) */
  readonly line: number;
  readonly cells: readonly string[];
}

export interface DelimitedTable {
  readonly header: readonly string[];
  readonly rows: readonly TableRow[];
}

export interface ParseDelimitedOptions {
  readonly delimiter: string;
  /** File path or label used in error messages */
  readonly source?: string;
}

/**
 * Picks the delimiter for a table from its file extension:
 * comma for `.csv`, tab for everything else.
 */
export function delimiterForPath(filePath: string): string {
  return extname(filePath).toLowerCase() === ".csv" ? "," : "\t";
}

/**
 * Parses delimited text into a header and rows.
 *
 * Fields may be wrapped in double quotes, in which case they can contain
 * the delimiter, line breaks and doubled quotes. CRLF and LF line endings
 * are both accepted. Rows whose cells are all blank are skipped. Cells
 * are returned untrimmed; header names are trimmed.
 *
 * @throws {InputSchemaError} on an unterminated quoted field
 */
export function parseDelimited(content: string, options: ParseDelimitedOptions): DelimitedTable {
  const { delimiter } = options;
  const records: TableRow[] = [];

  let cells: string[] = [];
  let field = "";
  let quoted = false;
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  const endRecord = (): void => {
    cells.push(field);
    if (cells.some((cell) => cell.trim() !== "")) {
      records.push({ line: recordLine, cells });
    }
    cells = [];
    field = "";
    quoted = false;
  };

  let i = 0;
  while (i < content.length) {
    const ch = content.charAt(i);

    if (inQuotes) {
      if (ch === '"') {
        if (content.charAt(i + 1) === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        if (ch === "\n") line++;
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === "" && !quoted) {
      inQuotes = true;
      quoted = true;
    } else if (ch === delimiter) {
      cells.push(field);
      field = "";
      quoted = false;
    } else if (ch === "\n") {
      endRecord();
      line++;
      recordLine = line;
    } else if (!(ch === "\r" && content.charAt(i + 1) === "\n")) {
      field += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new InputSchemaError(options.source ?? "<input>", [
      `line ${recordLine}: unterminated quoted field`,
    ]);
  }
  if (field !== "" || cells.length > 0) {
    endRecord();
  }

  const [first, ...rows] = records;
  return {
    header: first ? first.cells.map((name) => name.trim()) : [],
    rows,
  };
}

/**
 * Pairs a row's cells with the header. Missing trailing cells become
 * empty strings; cells beyond the header are ignored.
 */
export function rowToObject(header: readonly string[], row: TableRow): Record<string, string> {
  const obj: Record<string, string> = {};
  header.forEach((name, index) => {
    obj[name] = row.cells[index] ?? "";
  });
  return obj;
}

/**
 * Renders rows as delimited text, one line per row, each terminated by
 * `\n`. Cells containing the delimiter, a quote or a line break are
 * quoted.
 */
export function formatDelimited(
  rows: readonly (readonly string[])[],
  delimiter: string,
): string {
  return rows.map((row) => `${row.map((cell) => quoteCell(cell, delimiter)).join(delimiter)}\n`).join("");
}

function quoteCell(cell: string, delimiter: string): string {
  if (cell.includes(delimiter) || cell.includes('"') || cell.includes("\n") || cell.includes("\r")) {
    return `"${cell.replaceAll('"', '""')}"`;
  }
  return cell;
}
