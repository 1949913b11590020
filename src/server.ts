import * as http from "http";
import { z } from "zod";
import {
  LOGIN_FAILED_MESSAGE,
  MAX_UPLOAD_BYTES,
  REPORT_VARIANTS,
} from "./constants";
import { generateDashboardHtml } from "./reporters/dashboard-page";
import { buildBarFigure, buildPieFigure } from "./reporters/chart-builder";
import { buildReportTable } from "./reporters/table-builder";
import { parseBasicAuth, verifyCredentials } from "./services/access-gate";
import { buildReport } from "./services/report-builder";
import { ColumnTemplate, DashboardConfig, StudentReport } from "./types";
import { supportMessage } from "./utils/config";
import { ReportBuildError } from "./utils/errors";

const loginRequestSchema = z.object({
  username: z.string(),
  password: z.string(),
});

const reportRequestSchema = z.object({
  contents: z.string(),
});

/**
 * Failure that maps directly to an HTTP status
 */
class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly kind: string,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function sendJson(
  res: http.ServerResponse,
  status: number,
  body: unknown
): void {
  res.writeHead(status, { "Content-Type": "application/json; charset=utf-8" });
  res.end(JSON.stringify(body));
}

function sendError(
  res: http.ServerResponse,
  status: number,
  kind: string,
  message: string
): void {
  sendJson(res, status, { error: kind, message });
}

/**
 * Collect the request body, rejecting bodies over the upload limit
 */
function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let rejected = false;

    req.on("data", (chunk: Buffer) => {
      if (rejected) return;
      size += chunk.length;
      if (size > limit) {
        rejected = true;
        reject(
          new HttpError(413, "PayloadTooLarge", `Upload exceeds ${limit} bytes`)
        );
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!rejected) resolve(Buffer.concat(chunks).toString("utf-8"));
    });
    req.on("error", reject);
  });
}

/**
 * Read and validate a JSON request body
 */
async function readJson<T>(
  req: http.IncomingMessage,
  schema: z.ZodType<T>
): Promise<T> {
  const text = await readBody(req, MAX_UPLOAD_BYTES);

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    throw new HttpError(400, "BadRequest", "Request body must be JSON");
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new HttpError(
      400,
      "BadRequest",
      `Invalid request body: ${issue.path.join(".") || "body"} ${issue.message}`
    );
  }
  return parsed.data;
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      throw new HttpError(404, "NotFound", `Malformed path segment "${segment}"`);
    }
    throw error;
  }
}

async function handleLogin(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  config: DashboardConfig
): Promise<void> {
  const credentials = await readJson(req, loginRequestSchema);
  if (!verifyCredentials(credentials, config)) {
    console.warn(`Rejected login attempt for user "${credentials.username}"`);
    sendError(res, 401, "AuthError", LOGIN_FAILED_MESSAGE);
    return;
  }
  sendJson(res, 200, { ok: true });
}

async function handleReport(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  config: DashboardConfig,
  variant: ColumnTemplate
): Promise<void> {
  const credentials = parseBasicAuth(req.headers.authorization);
  if (!credentials || !verifyCredentials(credentials, config)) {
    res.setHeader("WWW-Authenticate", 'Basic realm="weekly-stars"');
    sendError(res, 401, "AuthError", LOGIN_FAILED_MESSAGE);
    return;
  }

  const { contents } = await readJson(req, reportRequestSchema);

  const startTime = Date.now();
  console.log(
    `Building report for variant ${variant.label} (${contents.length} characters)`
  );

  let report: StudentReport;
  try {
    report = buildReport(contents, variant);
  } catch (error) {
    if (error instanceof ReportBuildError) {
      console.warn(`Report build failed (${error.kind}): ${error.message}`);
      sendError(res, 400, error.kind, error.message);
      return;
    }
    throw error;
  }

  console.log(
    `Built report for variant ${variant.label}: ${
      report.records.length
    } students in ${Date.now() - startTime}ms`
  );

  sendJson(res, 200, {
    variant: { id: variant.id, label: variant.label },
    table: buildReportTable(report.records),
    barFigure: buildBarFigure(report.weeklySeries),
    pieFigure: buildPieFigure(report.starCounts),
    weeklySeries: report.weeklySeries,
    starCounts: report.starCounts,
  });
}

/**
 * Route a single request
 */
export async function handleRequest(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  config: DashboardConfig,
  variants: ColumnTemplate[] = REPORT_VARIANTS
): Promise<void> {
  const url = new URL(req.url ?? "/", "http://localhost");
  const method = req.method ?? "GET";
  const reportMatch = url.pathname.match(/^\/api\/reports\/([^/]+)$/);

  try {
    if (method === "GET" && url.pathname === "/") {
      res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
      res.end(generateDashboardHtml(variants));
    } else if (method === "GET" && url.pathname === "/api/variants") {
      sendJson(
        res,
        200,
        variants.map(({ id, label }) => ({ id, label }))
      );
    } else if (method === "GET" && url.pathname === "/api/support") {
      sendJson(res, 200, { message: supportMessage(config) });
    } else if (method === "POST" && url.pathname === "/api/login") {
      await handleLogin(req, res, config);
    } else if (method === "POST" && reportMatch) {
      const variantId = decodePathSegment(reportMatch[1]);
      const variant = variants.find((v) => v.id === variantId);
      if (!variant) {
        sendError(res, 404, "NotFound", `Unknown report variant "${variantId}"`);
        return;
      }
      await handleReport(req, res, config, variant);
    } else {
      sendError(res, 404, "NotFound", `No route for ${method} ${url.pathname}`);
    }
  } catch (error) {
    if (error instanceof HttpError) {
      sendError(res, error.status, error.kind, error.message);
      return;
    }
    console.error(`Error handling ${method} ${url.pathname}:`, error);
    sendError(res, 500, "InternalError", "Unexpected server error");
  }
}

/**
 * Create the dashboard HTTP server (not yet listening)
 */
export function createDashboardServer(
  config: DashboardConfig,
  variants: ColumnTemplate[] = REPORT_VARIANTS
): http.Server {
  return http.createServer((req, res) => {
    handleRequest(req, res, config, variants).catch((error) => {
      console.error("Unhandled error in request handler:", error);
      if (!res.headersSent) {
        sendError(res, 500, "InternalError", "Unexpected server error");
      } else {
        res.end();
      }
    });
  });
}

/**
 * Start the dashboard and resolve once it is listening
 * @returns The listening server
 */
export function startServer(
  config: DashboardConfig,
  variants: ColumnTemplate[] = REPORT_VARIANTS
): Promise<http.Server> {
  const server = createDashboardServer(config, variants);

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      const address = server.address();
      const location =
        address && typeof address === "object"
          ? `http://${address.address}:${address.port}/`
          : String(address);
      console.log(`Weekly stars dashboard listening on ${location}`);
      resolve(server);
    });
  });
}
