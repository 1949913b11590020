import { expect } from "chai";
import {
  buildReport,
  buildStarCounts,
  buildWeeklySeries,
  coerceStars,
  formatPercentage,
  highestStar,
  templateColumns,
} from "./report-builder";
import { REPORT_VARIANTS } from "../constants";
import { DecodeError, ParseError, SchemaError } from "../utils/errors";
import {
  SAMPLE_STUDENTS,
  studentUpload,
  workbookBytes,
} from "../test-utils/workbooks";
import { encodeUpload } from "./upload-decoder";
import { StudentRecord } from "../types";

const [firstVariant, secondVariant] = REPORT_VARIANTS;

describe("report builder", () => {
  describe("templateColumns", () => {
    it("flattens the first variant in output order", () => {
      expect(templateColumns(firstVariant)).to.deep.equal([
        0, 1, 2, 6, 13, 16, 23, 26, 33, 36, 43, 46, 53, 56, 63,
      ]);
    });

    it("flattens the second variant in output order", () => {
      expect(templateColumns(secondVariant)).to.deep.equal([
        0, 1, 2, 6, 15, 18, 27, 30, 39, 42, 51, 54, 63, 66, 75,
      ]);
    });
  });

  describe("coerceStars", () => {
    it("keeps numbers as they are", () => {
      expect(coerceStars(3)).to.equal(3);
      expect(coerceStars(0)).to.equal(0);
      expect(coerceStars(2.5)).to.equal(2.5);
    });

    it("keeps numbers outside the usual zero to five stars", () => {
      expect(coerceStars(7)).to.equal(7);
      expect(coerceStars(-1)).to.equal(-1);
      expect(coerceStars("6")).to.equal(6);
    });

    it("parses numeric text", () => {
      expect(coerceStars("4")).to.equal(4);
      expect(coerceStars(" 2.5 ")).to.equal(2.5);
      expect(coerceStars(".5")).to.equal(0.5);
      expect(coerceStars("1e1")).to.equal(10);
    });

    it("turns booleans into 1 and 0", () => {
      expect(coerceStars(true)).to.equal(1);
      expect(coerceStars(false)).to.equal(0);
    });

    it("returns null for anything that is not a number", () => {
      expect(coerceStars("absent")).to.equal(null);
      expect(coerceStars("")).to.equal(null);
      expect(coerceStars("   ")).to.equal(null);
      expect(coerceStars(null)).to.equal(null);
      expect(coerceStars(Number.NaN)).to.equal(null);
      expect(coerceStars("Infinity")).to.equal(null);
    });

    it("does not read hex, binary or octal literals as numbers", () => {
      expect(coerceStars("0x3")).to.equal(null);
      expect(coerceStars("0b11")).to.equal(null);
      expect(coerceStars("0o3")).to.equal(null);
    });
  });

  describe("highestStar", () => {
    it("ignores missing scores", () => {
      expect(highestStar([null, 2, 4, null, 1, 0])).to.equal(4);
    });

    it("is null when every score is missing", () => {
      expect(highestStar([null, null, null, null, null, null])).to.equal(null);
    });
  });

  describe("formatPercentage", () => {
    it("formats stars out of five with two decimals", () => {
      expect(formatPercentage(3)).to.equal("60.00%");
      expect(formatPercentage(2.5)).to.equal("50.00%");
      expect(formatPercentage(0)).to.equal("0.00%");
      expect(formatPercentage(5)).to.equal("100.00%");
    });

    it("is empty without a rating", () => {
      expect(formatPercentage(null)).to.equal("");
    });
  });

  describe("buildReport", () => {
    const upload = studentUpload(SAMPLE_STUDENTS, firstVariant);

    it("returns one record per student row", () => {
      const report = buildReport(upload, firstVariant);

      expect(report.records).to.have.length(10);
      expect(report.records.map((r) => r.name)).to.deep.equal([
        "Asha", "Bala", "Chitra", "Dev", "Esha",
        "Farid", "Gita", "Hari", "Indu", "Jay",
      ]);
    });

    it("keeps identity fields and week labels as read", () => {
      const [asha] = buildReport(upload, firstVariant).records;

      expect(asha.index).to.equal(1);
      expect(asha.rollNo).to.equal("R01");
      expect(asha.weeks[0].label).to.equal("done");
      expect(asha.weeks[1].label).to.equal(null);
    });

    it("derives the highest star and percentage per student", () => {
      const { records } = buildReport(upload, firstVariant);

      expect(records.map((r) => r.highestStar)).to.deep.equal([
        3, 0, 5, 3, null, 4, 1, 2.5, 7, 3,
      ]);
      expect(records.map((r) => r.percentage)).to.deep.equal([
        "60.00%", "0.00%", "100.00%", "60.00%", "",
        "80.00%", "20.00%", "50.00%", "140.00%", "60.00%",
      ]);
    });

    it("nulls non-numeric week cells and rates from the rest", () => {
      const dev = buildReport(upload, firstVariant).records[3];

      expect(dev.weeks.map((w) => w.stars)).to.deep.equal([
        null, 2, 2, 1, 3, null,
      ]);
      expect(dev.highestStar).to.equal(3);
    });

    it("keeps a rating above five stars in the week and the highest star", () => {
      const indu = buildReport(upload, firstVariant).records[8];

      expect(indu.weeks.map((w) => w.stars)).to.deep.equal([7, 1, 1, 1, 1, 1]);
      expect(indu.highestStar).to.equal(7);
      expect(indu.percentage).to.equal("140.00%");
    });

    it("keeps every percentage consistent with the highest star", () => {
      for (const record of buildReport(upload, firstVariant).records) {
        if (record.highestStar === null) {
          expect(record.percentage).to.equal("");
          continue;
        }
        expect(record.percentage).to.match(/%$/);
        expect(parseFloat(record.percentage)).to.be.closeTo(
          (record.highestStar / 5) * 100,
          0.01
        );
      }
    });

    it("leaves the first two students out of the weekly series", () => {
      const { weeklySeries } = buildReport(upload, firstVariant);

      expect(weeklySeries.map((s) => s.name)).to.deep.equal([
        "Week 1", "Week 2", "Week 3", "Week 4", "Week 5", "Week 6",
      ]);
      expect(weeklySeries[0].x).to.deep.equal([
        "Chitra", "Dev", "Esha", "Farid", "Gita", "Hari", "Indu", "Jay",
      ]);
      expect(weeklySeries[0].y).to.deep.equal([5, null, null, 4, 1, 2.5, 7, 3]);
      expect(weeklySeries[4].y).to.deep.equal([1, 3, null, 4, 1, 0, 1, 3]);
    });

    it("counts students per highest rating in ascending order", () => {
      const { starCounts } = buildReport(upload, firstVariant);

      expect(starCounts).to.deep.equal([
        { stars: 0, count: 1, label: "1 students = 0 stars" },
        { stars: 1, count: 1, label: "1 students = 1 stars" },
        { stars: 2.5, count: 1, label: "1 students = 2.5 stars" },
        { stars: 3, count: 3, label: "3 students = 3 stars" },
        { stars: 4, count: 1, label: "1 students = 4 stars" },
        { stars: 5, count: 1, label: "1 students = 5 stars" },
        { stars: 7, count: 1, label: "1 students = 7 stars" },
      ]);
      const total = starCounts.reduce((sum, group) => sum + group.count, 0);
      expect(total).to.equal(9);
    });

    it("reads the second variant's columns", () => {
      const report = buildReport(
        studentUpload(SAMPLE_STUDENTS.slice(0, 3), secondVariant),
        secondVariant
      );

      expect(report.records.map((r) => r.highestStar)).to.deep.equal([3, 0, 5]);
    });

    it("gives identical output for identical input", () => {
      expect(buildReport(upload, firstVariant)).to.deep.equal(
        buildReport(upload, firstVariant)
      );
    });

    it("fails with DecodeError on a malformed payload", () => {
      expect(() => buildReport("data:x;base64,%%%%", firstVariant)).to.throw(
        DecodeError
      );
    });

    it("fails with ParseError when the bytes are not a spreadsheet", () => {
      expect(() =>
        buildReport("data:text/plain;base64,aGVsbG8=", firstVariant)
      ).to.throw(ParseError);
    });

    it("fails with SchemaError when the sheet is too narrow", () => {
      const narrow = encodeUpload(
        workbookBytes([
          ["Title"], [], [], [], [], [], [], [],
          ["Sr", "Roll", "Name"],
          [1, "R01", "Asha"],
        ])
      );

      expect(() => buildReport(narrow, secondVariant)).to.throw(
        SchemaError,
        'Variant "4R" needs at least 76 columns, but the sheet has 3'
      );
    });

    it("rejects the first variant's sheet under the wider second variant", () => {
      expect(() => buildReport(upload, secondVariant)).to.throw(SchemaError);
    });
  });

  describe("chart series on small inputs", () => {
    const record = (name: string, stars: number | null): StudentRecord => ({
      index: null,
      rollNo: null,
      name,
      weeks: Array.from({ length: 6 }, () => ({ label: null, stars })),
      highestStar: stars,
      percentage: formatPercentage(stars),
    });

    it("produces empty series when only summary rows exist", () => {
      const series = buildWeeklySeries([record("Total", 5), record("Avg", 3)]);

      expect(series).to.have.length(6);
      expect(series.every((s) => s.x.length === 0 && s.y.length === 0)).to.equal(
        true
      );
    });

    it("leaves unrated students out of the star counts", () => {
      expect(buildStarCounts([record("A", null), record("B", 2)])).to.deep.equal([
        { stars: 2, count: 1, label: "1 students = 2 stars" },
      ]);
    });
  });
});
