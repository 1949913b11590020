import { MAX_STARS } from "../constants";
import { StudentReport } from "../types";

/**
 * Average of the highest star ratings, ignoring unrated students
 * @returns Average rounded to one decimal, or undefined if nobody is rated
 */
export function averageHighestStar(report: StudentReport): number | undefined {
  const rated = report.records
    .map((record) => record.highestStar)
    .filter((stars): stars is number => stars !== null);

  if (rated.length === 0) return undefined;

  const total = rated.reduce((sum, stars) => sum + stars, 0);
  return Math.round((total / rated.length) * 10) / 10;
}

/**
 * Print summary statistics for a built report
 * @param report Report to summarize
 * @param variantLabel Name of the report variant
 */
export function printReportSummary(
  report: StudentReport,
  variantLabel: string
): void {
  const ratedCount = report.starCounts.reduce(
    (sum, group) => sum + group.count,
    0
  );

  console.log(`\n=== Report Summary (${variantLabel}) ===`);
  console.log(
    `Total Students: ${report.records.length} (${ratedCount} with a star rating)`
  );

  const average = averageHighestStar(report);
  if (average !== undefined) {
    console.log(`Average Highest Star: ${average.toFixed(1)} / ${MAX_STARS}`);
  }

  console.log("\nStudents by highest star rating:");
  if (report.starCounts.length === 0) {
    console.log("- No star ratings found");
  } else {
    report.starCounts.forEach((group) => {
      console.log(`- ${group.label}`);
    });
  }
}
