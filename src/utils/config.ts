import * as dotenv from "dotenv";
import { DashboardConfig } from "../types";

const DEFAULT_PORT = 8050;
const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_SUPPORT_CONTACT = "the course coordinator";

/**
 * Parse a TCP port, falling back to the default on bad input
 */
export function parsePort(value: string | undefined): number {
  if (value === undefined || value.trim() === "") return DEFAULT_PORT;

  const port = parseInt(value, 10);
  if (!isNaN(port) && port >= 0 && port <= 65535) {
    return port;
  }

  console.warn(`Invalid port value "${value}". Using default port ${DEFAULT_PORT}.`);
  return DEFAULT_PORT;
}

/**
 * Load dashboard configuration from the environment (and .env, if present)
 * @param env Environment variables to read; defaults to process.env after loading .env
 * @returns Validated configuration
 */
export function loadConfig(env?: NodeJS.ProcessEnv): DashboardConfig {
  if (!env) {
    dotenv.config();
  }
  const source = env ?? process.env;

  const username = source.DASHBOARD_USERNAME;
  const password = source.DASHBOARD_PASSWORD;
  if (!username || !password) {
    throw new Error(
      "DASHBOARD_USERNAME and DASHBOARD_PASSWORD must be set to start the dashboard"
    );
  }

  return {
    username,
    password,
    port: parsePort(source.PORT),
    host: source.HOST || DEFAULT_HOST,
    supportContact: source.SUPPORT_CONTACT || DEFAULT_SUPPORT_CONTACT,
  };
}

/**
 * Message shown by the login screen's forgot-password button
 */
export function supportMessage(config: DashboardConfig): string {
  return `For password recovery, please contact ${config.supportContact}.`;
}
