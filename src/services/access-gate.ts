import { timingSafeEqual } from "crypto";
import { Credentials, DashboardConfig } from "../types";

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf-8");
  const right = Buffer.from(b, "utf-8");
  // timingSafeEqual throws on unequal lengths
  if (left.length !== right.length) {
    timingSafeEqual(left, left);
    return false;
  }
  return timingSafeEqual(left, right);
}

/**
 * Check a username/password pair against the configured one
 */
export function verifyCredentials(
  credentials: Credentials,
  config: DashboardConfig
): boolean {
  const userOk = safeEqual(credentials.username, config.username);
  const passwordOk = safeEqual(credentials.password, config.password);
  return userOk && passwordOk;
}

/**
 * Read credentials from an HTTP Basic Authorization header
 * @param header Value of the Authorization header
 * @returns Credentials, or undefined if the header is missing or malformed
 */
export function parseBasicAuth(header: string | undefined): Credentials | undefined {
  if (!header) return undefined;

  const match = header.match(/^Basic\s+([A-Za-z0-9+/=]+)$/i);
  if (!match) return undefined;

  const decoded = Buffer.from(match[1], "base64").toString("utf-8");
  const separator = decoded.indexOf(":");
  if (separator < 0) return undefined;

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}
