import {
  HIGHEST_STAR_COLUMN,
  OUTPUT_COLUMNS,
  PERCENTAGE_COLUMN,
  TABLE_COLUMNS,
} from "../constants";
import { ReportTable, StudentRecord, TableCell } from "../types";

/**
 * Lay records out under the fixed column names
 * @param records Shaped student records
 * @returns Column names and one row object per record
 */
export function buildReportTable(records: StudentRecord[]): ReportTable {
  const rows = records.map((record) => {
    const values: TableCell[] = [
      record.index,
      record.rollNo,
      record.name,
      ...record.weeks.flatMap((week) => [week.label, week.stars]),
    ];

    const row: Record<string, TableCell> = {};
    OUTPUT_COLUMNS.forEach((column, i) => {
      row[column] = values[i] ?? null;
    });
    row[HIGHEST_STAR_COLUMN] = record.highestStar;
    row[PERCENTAGE_COLUMN] = record.percentage;
    return row;
  });

  return { columns: [...TABLE_COLUMNS], rows };
}
