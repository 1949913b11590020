/**
 * A single spreadsheet cell value; empty cells are null
 */
export type CellValue = string | number | boolean | null;

/**
 * Source columns for one week: the week-label column and the stars column
 */
export interface WeekColumns {
  label: number;
  stars: number;
}

/**
 * Named column layout for a report variant.
 * Indices are zero-based positions in the uploaded sheet.
 */
export interface ColumnTemplate {
  id: string;
  label: string;
  columns: {
    index: number;
    rollNo: number;
    names: number;
    weeks: [
      WeekColumns,
      WeekColumns,
      WeekColumns,
      WeekColumns,
      WeekColumns,
      WeekColumns
    ];
  };
}

/**
 * Worksheet contents below the header band
 */
export interface RawSheet {
  rows: CellValue[][];
  columnCount: number;
}

export interface WeekEntry {
  label: CellValue;
  stars: number | null;
}

/**
 * One shaped row of the uploaded sheet
 */
export interface StudentRecord {
  index: CellValue;
  rollNo: CellValue;
  name: CellValue;
  weeks: WeekEntry[];
  highestStar: number | null;
  percentage: string; // "" when there is no star rating
}

/**
 * Bar chart series for one week
 */
export interface WeeklySeries {
  name: string;
  x: string[];
  y: (number | null)[];
}

/**
 * Number of students whose highest rating is `stars`
 */
export interface StarCount {
  stars: number;
  count: number;
  label: string;
}

export interface ChartSummary {
  weeklySeries: WeeklySeries[];
  starCounts: StarCount[];
}

/**
 * Complete output of a report build
 */
export interface StudentReport extends ChartSummary {
  records: StudentRecord[];
}

export type TableCell = CellValue;

/**
 * Tabular view of the records with fixed column order
 */
export interface ReportTable {
  columns: string[];
  rows: Record<string, TableCell>[];
}

/**
 * Chart figures in the shape Plotly.newPlot takes
 */
export interface BarTrace {
  type: "bar";
  name: string;
  x: string[];
  y: (number | null)[];
}

export interface PieTrace {
  type: "pie";
  labels: string[];
  values: number[];
  marker: { colors: string[] };
}

export interface FigureLayout {
  title: string;
  xaxis?: { title: string; tickangle?: number; automargin?: boolean };
  yaxis?: { title: string };
  plot_bgcolor: string;
  paper_bgcolor: string;
  font: { color: string };
  margin?: { b: number; t: number; l: number; r: number };
}

export interface Figure<T> {
  data: T[];
  layout: FigureLayout;
}

/**
 * Runtime configuration for the dashboard server
 */
export interface DashboardConfig {
  username: string;
  password: string;
  port: number;
  host: string;
  supportContact: string;
}

export interface Credentials {
  username: string;
  password: string;
}
