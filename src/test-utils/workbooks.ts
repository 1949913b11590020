import * as XLSX from "xlsx";
import { HEADER_ROWS } from "../constants";
import { templateColumns } from "../services/report-builder";
import { encodeUpload } from "../services/upload-decoder";
import { CellValue, ColumnTemplate } from "../types";

export interface FixtureStudent {
  index: CellValue;
  rollNo: CellValue;
  name: CellValue;
  stars: CellValue[]; // six week cells
  labels?: CellValue[];
}

/**
 * Serialize rows of cells into an .xlsx workbook
 */
export function workbookBytes(rows: CellValue[][]): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet(rows);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, "Stars");
  const bytes: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return bytes;
}

/**
 * Lay students out the way a practice export does: a title band, a
 * column-header row, then one row per student at the template's columns
 */
export function studentSheetRows(
  students: FixtureStudent[],
  template: ColumnTemplate
): CellValue[][] {
  const columns = templateColumns(template);
  const width = Math.max(...columns) + 1;

  const band: CellValue[][] = Array.from({ length: HEADER_ROWS }, (_, i) =>
    i === 0 ? ["Weekly Practice Stars"] : []
  );

  const header: CellValue[] = new Array<CellValue>(width).fill(null);
  columns.forEach((column, i) => {
    header[column] = `Column ${i + 1}`;
  });

  const body = students.map((student) => {
    const row: CellValue[] = new Array<CellValue>(width).fill(null);
    const values: CellValue[] = [
      student.index,
      student.rollNo,
      student.name,
      ...student.stars.flatMap((stars, week) => [
        student.labels?.[week] ?? null,
        stars,
      ]),
    ];
    columns.forEach((column, i) => {
      row[column] = values[i] ?? null;
    });
    return row;
  });

  return [...band, header, ...body];
}

export function studentUpload(
  students: FixtureStudent[],
  template: ColumnTemplate
): string {
  return encodeUpload(workbookBytes(studentSheetRows(students, template)));
}

/**
 * Ten students covering blanks, text, fractional and above-five ratings
 */
export const SAMPLE_STUDENTS: FixtureStudent[] = [
  { index: 1, rollNo: "R01", name: "Asha", stars: [1, 2, 3, "", null, 2], labels: ["done"] },
  { index: 2, rollNo: "R02", name: "Bala", stars: [0, 0, 0, 0, 0, 0] },
  { index: 3, rollNo: "R03", name: "Chitra", stars: [5, 4, 3, 2, 1, 0] },
  { index: 4, rollNo: "R04", name: "Dev", stars: ["absent", 2, 2, 1, "3", null] },
  { index: 5, rollNo: "R05", name: "Esha", stars: [null, null, null, null, null, null] },
  { index: 6, rollNo: "R06", name: "Farid", stars: [4, 4, 4, 4, 4, 4] },
  { index: 7, rollNo: "R07", name: "Gita", stars: [1, 1, 1, 1, 1, 1] },
  { index: 8, rollNo: "R08", name: "Hari", stars: [2.5, 1, 0, 0, 0, 0] },
  { index: 9, rollNo: "R09", name: "Indu", stars: [7, 1, 1, 1, 1, 1] },
  { index: 10, rollNo: "R10", name: "Jay", stars: [3, 3, 3, 3, 3, 3] },
];
