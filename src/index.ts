#!/usr/bin/env node
import { DEFAULT_VARIANT_ID, REPORT_VARIANTS } from "./constants";
import { printReportSummary } from "./reporters/report-generator";
import { buildReportFromBytes } from "./services/report-builder";
import { startServer } from "./server";
import { findArgValue } from "./utils/cli-args";
import { loadConfig, parsePort } from "./utils/config";
import * as fsUtils from "./utils/fs-utils";

/**
 * Build a report from a spreadsheet on disk and print its summary
 * @param filePath Path to the workbook
 * @param variantId Report variant to apply (default: "2n-2r-3r")
 */
export async function runFileReport(
  filePath: string,
  variantId: string = DEFAULT_VARIANT_ID
): Promise<void> {
  const variant = REPORT_VARIANTS.find((v) => v.id === variantId);
  if (!variant) {
    throw new Error(
      `Unknown variant "${variantId}". Available variants: ${REPORT_VARIANTS.map(
        (v) => v.id
      ).join(", ")}`
    );
  }

  if (!(await fsUtils.fileExists(filePath))) {
    throw new Error(`File not found: ${filePath}`);
  }

  const startTime = Date.now();
  console.log(`Building ${variant.label} report from ${filePath}...`);

  const bytes = await fsUtils.readBinaryFile(filePath);
  const report = buildReportFromBytes(bytes, variant);

  printReportSummary(report, variant.label);
  console.log(`\nTotal execution time: ${Date.now() - startTime}ms`);
}

/**
 * Start the password-gated dashboard
 * @param portOverride Port given on the command line, if any
 */
export async function runDashboard(portOverride?: string): Promise<void> {
  const config = loadConfig();
  if (portOverride !== undefined) {
    config.port = parsePort(portOverride);
  }
  await startServer(config);
}

// Run the dashboard if this file is executed directly
if (require.main === module) {
  const args = process.argv.slice(2);
  const filePath = findArgValue(args, "file");

  if (filePath) {
    runFileReport(filePath, findArgValue(args, "variant")).catch((error) => {
      console.error("Error building report:", error);
      process.exit(1);
    });
  } else {
    runDashboard(findArgValue(args, "port")).catch((error) => {
      console.error("Error starting dashboard:", error);
      process.exit(1);
    });
  }
}
