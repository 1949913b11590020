import { BAR_CHART_TITLE, COLORS, PIE_CHART_TITLE } from "../constants";
import {
  BarTrace,
  Figure,
  PieTrace,
  StarCount,
  WeeklySeries,
} from "../types";

/**
 * Grouped bar chart of stars per week for each student
 * @param weeklySeries One series per week
 * @returns Plotly figure
 */
export function buildBarFigure(weeklySeries: WeeklySeries[]): Figure<BarTrace> {
  return {
    data: weeklySeries.map((series): BarTrace => ({
      type: "bar",
      name: series.name,
      x: series.x,
      y: series.y,
    })),
    layout: {
      title: BAR_CHART_TITLE,
      xaxis: { title: "Student Names", tickangle: -45, automargin: true },
      yaxis: { title: "Stars in HackerRank" },
      plot_bgcolor: COLORS.background,
      paper_bgcolor: COLORS.background,
      font: { color: COLORS.text },
      margin: { b: 100, t: 50, l: 50, r: 50 },
    },
  };
}

/**
 * Pie chart of how many students reached each highest star rating
 * @param starCounts Groups sorted by rating
 * @returns Plotly figure
 */
export function buildPieFigure(starCounts: StarCount[]): Figure<PieTrace> {
  return {
    data: [
      {
        type: "pie",
        labels: starCounts.map((group) => group.label),
        values: starCounts.map((group) => group.count),
        marker: { colors: [...COLORS.pie] },
      },
    ],
    layout: {
      title: PIE_CHART_TITLE,
      plot_bgcolor: COLORS.background,
      paper_bgcolor: COLORS.background,
      font: { color: COLORS.text },
    },
  };
}
