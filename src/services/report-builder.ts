import { MAX_STARS, SERIES_SKIP_ROWS, WEEK_COUNT } from "../constants";
import {
  CellValue,
  ColumnTemplate,
  RawSheet,
  StarCount,
  StudentRecord,
  StudentReport,
  WeekEntry,
  WeeklySeries,
} from "../types";
import { SchemaError } from "../utils/errors";
import { readSheet } from "./sheet-reader";
import { decodeUpload } from "./upload-decoder";

/**
 * Flatten a template into its 15 source columns, in output order
 * @returns Index, Roll no, Names, then label/stars pairs for weeks 1-6
 */
export function templateColumns(template: ColumnTemplate): number[] {
  const { index, rollNo, names, weeks } = template.columns;
  return [
    index,
    rollNo,
    names,
    ...weeks.flatMap((week) => [week.label, week.stars]),
  ];
}

// Plain decimal notation only; Number() would also take 0x, 0b and 0o prefixes
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Best-effort numeric coercion: anything that does not read as a number is null.
 */
export function coerceStars(value: CellValue): number | null {
  let parsed: number;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "boolean") {
    parsed = value ? 1 : 0;
  } else if (typeof value === "string" && DECIMAL_PATTERN.test(value.trim())) {
    parsed = Number(value.trim());
  } else {
    return null;
  }

  return Number.isFinite(parsed) ? parsed : null;
}

export function highestStar(scores: (number | null)[]): number | null {
  const rated = scores.filter((score): score is number => score !== null);
  return rated.length > 0 ? Math.max(...rated) : null;
}

export function formatPercentage(stars: number | null): string {
  if (stars === null) return "";
  return `${((stars / MAX_STARS) * 100).toFixed(2)}%`;
}

function cellText(value: CellValue): string {
  return value === null ? "" : String(value);
}

/**
 * Select the template's columns from every row and derive the star fields
 */
export function shapeRecords(
  sheet: RawSheet,
  template: ColumnTemplate
): StudentRecord[] {
  const columns = templateColumns(template);
  const required = Math.max(...columns) + 1;
  if (sheet.columnCount < required) {
    throw new SchemaError(
      `Variant "${template.label}" needs at least ${required} columns, but the sheet has ${sheet.columnCount}`
    );
  }

  return sheet.rows.map((row) => {
    const [index, rollNo, name, ...weekCells] = columns.map(
      (column) => row[column] ?? null
    );

    const weeks: WeekEntry[] = [];
    for (let i = 0; i < weekCells.length; i += 2) {
      weeks.push({ label: weekCells[i], stars: coerceStars(weekCells[i + 1]) });
    }

    const best = highestStar(weeks.map((week) => week.stars));
    return {
      index,
      rollNo,
      name,
      weeks,
      highestStar: best,
      percentage: formatPercentage(best),
    };
  });
}

/**
 * Per-week bar series; the leading summary rows are left out
 */
export function buildWeeklySeries(records: StudentRecord[]): WeeklySeries[] {
  const charted = records.slice(SERIES_SKIP_ROWS);

  return Array.from({ length: WEEK_COUNT }, (_, week) => ({
    name: `Week ${week + 1}`,
    x: charted.map((record) => cellText(record.name)),
    y: charted.map((record) => record.weeks[week].stars),
  }));
}

/**
 * Count records per highest star rating, ascending by rating
 */
export function buildStarCounts(records: StudentRecord[]): StarCount[] {
  const counts = new Map<number, number>();
  for (const record of records) {
    if (record.highestStar === null) continue;
    counts.set(record.highestStar, (counts.get(record.highestStar) || 0) + 1);
  }

  return Array.from(counts.entries())
    .sort((a, b) => a[0] - b[0])
    .map(([stars, count]) => ({
      stars,
      count,
      label: `${count} students = ${stars} stars`,
    }));
}

/**
 * Build a report from workbook bytes
 * @param bytes Workbook file contents
 * @param template Column layout of the report variant
 */
export function buildReportFromBytes(
  bytes: Buffer,
  template: ColumnTemplate
): StudentReport {
  const sheet = readSheet(bytes);
  const records = shapeRecords(sheet, template);

  return {
    records,
    weeklySeries: buildWeeklySeries(records),
    starCounts: buildStarCounts(records),
  };
}

/**
 * Build a report from an uploaded data-URL string.
 * Any failure throws a ReportBuildError and nothing is returned.
 * @param contents "<mime-prefix>,<base64-payload>" upload
 * @param template Column layout of the report variant
 */
export function buildReport(
  contents: string,
  template: ColumnTemplate
): StudentReport {
  return buildReportFromBytes(decodeUpload(contents), template);
}
