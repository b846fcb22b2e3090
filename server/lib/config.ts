import type { RedirectStatus } from "./types.js";

export interface ServerConfig {
  port: number;
  host: string;
  /** When false, paths are passed through without canonicalization. */
  redirect: boolean;
  status: RedirectStatus;
}

type Env = Record<string, string | undefined>;

function parsePort(value: string | undefined): number {
  if (value === undefined) return 1900;
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 0 || port > 65535 || String(port) !== value) {
    throw new Error(`CLEAN_PATH_PORT must be a port number, got "${value}"`);
  }
  return port;
}

function parseSwitch(value: string | undefined): boolean {
  if (value === undefined || value === "on") return true;
  if (value === "off") return false;
  throw new Error(`CLEAN_PATH_REDIRECT must be "on" or "off", got "${value}"`);
}

function parseStatus(value: string | undefined): RedirectStatus {
  if (value === undefined || value === "308") return 308;
  if (value === "301") return 301;
  throw new Error(`CLEAN_PATH_STATUS must be 301 or 308, got "${value}"`);
}

/** Read server settings from the environment. Throws on invalid values. */
export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    port: parsePort(env.CLEAN_PATH_PORT),
    host: env.CLEAN_PATH_HOST ?? "0.0.0.0",
    redirect: parseSwitch(env.CLEAN_PATH_REDIRECT),
    status: parseStatus(env.CLEAN_PATH_STATUS),
  };
}
