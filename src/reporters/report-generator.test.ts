import { expect } from "chai";
import { averageHighestStar } from "./report-generator";
import { buildReport } from "../services/report-builder";
import { REPORT_VARIANTS } from "../constants";
import { SAMPLE_STUDENTS, studentUpload } from "../test-utils/workbooks";

describe("averageHighestStar", () => {
  it("averages rated students only", () => {
    const report = buildReport(
      studentUpload(SAMPLE_STUDENTS, REPORT_VARIANTS[0]),
      REPORT_VARIANTS[0]
    );

    // (3 + 0 + 5 + 3 + 4 + 1 + 2.5 + 7 + 3) / 9
    expect(averageHighestStar(report)).to.equal(3.2);
  });

  it("is undefined for a report without ratings", () => {
    expect(
      averageHighestStar({ records: [], weeklySeries: [], starCounts: [] })
    ).to.equal(undefined);
  });
});
