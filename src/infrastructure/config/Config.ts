import dotenv from "dotenv";
import { isLogLevel, type LogLevel } from "../../domain/ports/ILogger.js";

// Load environment variables from .env when present
dotenv.config();

export const DEFAULT_API_URL = "https://api.netatmo.com/api/";
const MIN_REFRESH_INTERVAL = 10_000;

export interface AppConfig {
  api: {
    baseUrl: string;
    /** OAuth access token, obtained outside the agent */
    accessToken: string;
    /** Request timeout in ms */
    timeout: number;
  };
  agent: {
    name: string;
    /** Refresh period in ms */
    refreshInterval: number;
    /** Serve recorded responses from this directory instead of calling the API */
    fixturesDir?: string;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

function getEnvOrDefault(env: NodeJS.ProcessEnv, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getEnvNumber(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const level = getEnvOrDefault(env, "LOG_LEVEL", "info");
  if (!isLogLevel(level)) {
    throw new Error(`LOG_LEVEL "${level}" is not a valid log level`);
  }
  return level;
}

/**
 * Build the configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fixturesDir = env.CLIMATE_FIXTURES_DIR || undefined;
  const accessToken = env.CLIMATE_ACCESS_TOKEN ?? "";

  if (!accessToken && !fixturesDir) {
    throw new Error(
      "Missing required environment variable: CLIMATE_ACCESS_TOKEN (or set CLIMATE_FIXTURES_DIR)"
    );
  }

  return {
    api: {
      baseUrl: getEnvOrDefault(env, "CLIMATE_API_URL", DEFAULT_API_URL),
      accessToken,
      timeout: getEnvNumber(env, "CLIMATE_REQUEST_TIMEOUT", 10_000),
    },
    agent: {
      name: getEnvOrDefault(env, "AGENT_NAME", "climate-agent"),
      refreshInterval: getEnvNumber(env, "CLIMATE_REFRESH_INTERVAL", 300_000),
      fixturesDir,
    },
    logging: {
      level: getEnvLogLevel(env),
      pretty: env.NODE_ENV !== "production",
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  if (
    !config.api.baseUrl.startsWith("http://") &&
    !config.api.baseUrl.startsWith("https://")
  ) {
    throw new Error("CLIMATE_API_URL must start with http:// or https://");
  }

  if (config.agent.refreshInterval < MIN_REFRESH_INTERVAL) {
    throw new Error(
      `CLIMATE_REFRESH_INTERVAL must be at least ${MIN_REFRESH_INTERVAL} ms`
    );
  }
}
