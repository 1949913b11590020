import { ColumnTemplate } from "./types";

// Title and instruction rows above the sheet's own column-header row
export const HEADER_ROWS = 8;

// Leading records left out of the bar chart series
export const SERIES_SKIP_ROWS = 2;

export const MAX_STARS = 5;

export const WEEK_COUNT = 6;

export const IDENTITY_COLUMNS = ["Index", "Roll no", "Names"] as const;

/**
 * Output names for the 15 selected columns, in order
 */
export const OUTPUT_COLUMNS: string[] = [
  ...IDENTITY_COLUMNS,
  ...Array.from({ length: WEEK_COUNT }, (_, i) => [
    `WEEK${i + 1}`,
    `${i + 1}`,
  ]).flat(),
];

export const HIGHEST_STAR_COLUMN = "HighestStar";
export const PERCENTAGE_COLUMN = "Percentage";

export const TABLE_COLUMNS: string[] = [
  ...OUTPUT_COLUMNS,
  HIGHEST_STAR_COLUMN,
  PERCENTAGE_COLUMN,
];

export const REPORT_VARIANTS: ColumnTemplate[] = [
  {
    id: "2n-2r-3r",
    label: "2N, 2R, 3R",
    columns: {
      index: 0,
      rollNo: 1,
      names: 2,
      weeks: [
        { label: 6, stars: 13 },
        { label: 16, stars: 23 },
        { label: 26, stars: 33 },
        { label: 36, stars: 43 },
        { label: 46, stars: 53 },
        { label: 56, stars: 63 },
      ],
    },
  },
  {
    id: "4r",
    label: "4R",
    columns: {
      index: 0,
      rollNo: 1,
      names: 2,
      weeks: [
        { label: 6, stars: 15 },
        { label: 18, stars: 27 },
        { label: 30, stars: 39 },
        { label: 42, stars: 51 },
        { label: 54, stars: 63 },
        { label: 66, stars: 75 },
      ],
    },
  },
];

export const DEFAULT_VARIANT_ID = "2n-2r-3r";

export const COLORS = {
  background: "#ffffff",
  text: "#000000",
  accent: "#2C3539",
  button: "#6495ED",
  pie: ["#FF0000", "#00FF00", "#FF7F50", "#0000FF", "#FFFF00"],
};

export const BAR_CHART_TITLE = "Bar Graph: stars for Weeks 1 to 6";
export const PIE_CHART_TITLE = "Pie Chart: Count of Students by Star Ratings";

export const LOGIN_FAILED_MESSAGE =
  "Login failed. Please check your credentials.";

export const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;
