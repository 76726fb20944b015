import { ConfigurationError } from "../errors";
import { isCallerCharset, CallerCharset } from "../http/encoding";
import { isLevel, Level } from "./logger";

export const DEFAULT_API_URI = "http://www.nabaztag.com/vl/FR/api.jsp?";

export type Env = {
  NABAZTAG_SERIAL: string;
  NABAZTAG_TOKEN: string;
  NABAZTAG_VOICE?: string;
  NABAZTAG_API_URI: string;
  NABAZTAG_CALLER_CHARSET: CallerCharset;
  NABAZTAG_HTTP_TIMEOUT_MS: number;
  LOG_LEVEL: Level;
};

type Source = Record<string, string | undefined>;

function required(source: Source, key: string): string {
  const value = source[key];
  if (!value) {
    throw new Error(`Missing required env: ${key}`);
  }
  return value;
}

export function loadEnv(source: Source = process.env): Env {
  const logLevel = source.LOG_LEVEL || "info";
  if (!isLevel(logLevel)) {
    throw new ConfigurationError(`Unknown LOG_LEVEL: ${logLevel}`);
  }

  const charset = source.NABAZTAG_CALLER_CHARSET || "utf8";
  if (!isCallerCharset(charset)) {
    throw new ConfigurationError(`Unknown NABAZTAG_CALLER_CHARSET: ${charset}`);
  }

  const timeoutMs = Number(source.NABAZTAG_HTTP_TIMEOUT_MS || 20000);
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(
      `Invalid NABAZTAG_HTTP_TIMEOUT_MS: ${source.NABAZTAG_HTTP_TIMEOUT_MS}`
    );
  }

  return {
    NABAZTAG_SERIAL: required(source, "NABAZTAG_SERIAL"),
    NABAZTAG_TOKEN: required(source, "NABAZTAG_TOKEN"),
    NABAZTAG_VOICE: source.NABAZTAG_VOICE || undefined,
    NABAZTAG_API_URI: source.NABAZTAG_API_URI || DEFAULT_API_URI,
    NABAZTAG_CALLER_CHARSET: charset,
    NABAZTAG_HTTP_TIMEOUT_MS: timeoutMs,
    LOG_LEVEL: logLevel,
  };
}
