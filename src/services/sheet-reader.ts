import * as XLSX from "xlsx";
import { HEADER_ROWS } from "../constants";
import { CellValue, RawSheet } from "../types";
import { ParseError } from "../utils/errors";

// xlsx, xlsm, xlsb and ods are ZIP containers; legacy xls is OLE2
const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE2_SIGNATURE = Buffer.from([
  0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1,
]);

function hasSpreadsheetSignature(bytes: Buffer): boolean {
  return [ZIP_SIGNATURE, OLE2_SIGNATURE].some(
    (signature) =>
      bytes.length >= signature.length &&
      bytes.subarray(0, signature.length).equals(signature)
  );
}

function isBlankRow(row: CellValue[]): boolean {
  return row.every((cell) => cell === null);
}

function toCellValue(value: unknown): CellValue {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return null;
}

/**
 * Read the first worksheet of a workbook, skipping the title band.
 *
 * Rows are addressed from A1 regardless of where the sheet's used range
 * starts. Fully blank rows are skipped; the first remaining row after
 * the band holds the sheet's own column headers and is dropped.
 * @param bytes Workbook file contents
 * @param headerRows Number of leading rows to discard
 */
export function readSheet(bytes: Buffer, headerRows = HEADER_ROWS): RawSheet {
  if (!hasSpreadsheetSignature(bytes)) {
    throw new ParseError("Uploaded file is not an Excel or OpenDocument workbook");
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: "buffer", cellDates: true });
  } catch (error) {
    throw new ParseError(
      `Could not read workbook: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { cause: error }
    );
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new ParseError("Workbook does not contain any worksheet");
  }

  const ref = sheet["!ref"];
  if (!ref) {
    return { rows: [], columnCount: 0 };
  }

  const used = XLSX.utils.decode_range(ref);
  if (used.e.r < headerRows) {
    // Nothing below the band, not even a column-header row
    return { rows: [], columnCount: 0 };
  }

  const range = XLSX.utils.encode_range({
    s: { r: headerRows, c: 0 },
    e: { r: used.e.r, c: used.e.c },
  });
  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    range,
    defval: null,
    blankrows: true,
    raw: true,
  });

  const rows = grid
    .map((row) => row.map(toCellValue))
    .filter((row) => !isBlankRow(row));

  return {
    rows: rows.slice(1),
    columnCount: used.e.c + 1,
  };
}
