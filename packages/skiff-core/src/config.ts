// Server configuration.
//
// A ServerConfig is a plain, fully resolved object. Build one with
// resolveServerConfig(), optionally seeded from the environment with
// serverConfigFromEnv().

import { DEFAULT_DECODER_OPTIONS, type DecoderOptions } from "@skiff/wire";

/** How decode failures in the middle of a request are logged. */
export const DecodingErrorLevel = {
  /** Log like any other error, with full detail. */
  FULL: "full",
  ERROR: "error",
  WARN: "warn",
  INFO: "info",
  /** Do not log at all. */
  SILENT: "silent",
} as const;

export type DecodingErrorLevel = (typeof DecodingErrorLevel)[keyof typeof DecodingErrorLevel];

const DECODING_ERROR_LEVELS: readonly string[] = Object.values(DecodingErrorLevel);

function isDecodingErrorLevel(value: string): value is DecodingErrorLevel {
  return DECODING_ERROR_LEVELS.includes(value);
}

export interface ServerConfig {
  /** Development mode puts diagnostic text into synthetic error responses. */
  development: boolean;
  decodingErrorLevel: DecodingErrorLevel;
  /** Close connections with no activity for this long. 0 disables the timer. */
  idleTimeoutMs: number;
  /** Default limit for RequestBody.readAll(). */
  maxContentLength: number;
  /** Buffered body bytes at which transport reads are paused. */
  bodyHighWatermark: number;
  /** Buffered body bytes below which paused reads resume. */
  bodyLowWatermark: number;
  decoder: Required<DecoderOptions>;
}

export type ServerConfigOptions = Partial<Omit<ServerConfig, "decoder">> & {
  decoder?: DecoderOptions;
};

/** Invalid configuration value. */
export class ConfigError extends Error {
  constructor(
    public key: string,
    message: string,
  ) {
    super(`invalid config ${key}: ${message}`);
    this.name = "ConfigError";
  }
}

export function defaultServerConfig(): ServerConfig {
  return {
    development: false,
    decodingErrorLevel: DecodingErrorLevel.WARN,
    idleTimeoutMs: 0,
    maxContentLength: 1024 * 1024,
    bodyHighWatermark: 64 * 1024,
    bodyLowWatermark: 16 * 1024,
    decoder: { ...DEFAULT_DECODER_OPTIONS },
  };
}

function requireNonNegativeInteger(key: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(key, `expected a non-negative integer, got ${value}`);
  }
}

function requirePositiveInteger(key: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(key, `expected a positive integer, got ${value}`);
  }
}

/**
 * Merge `options` over the defaults and validate the result.
 *
 * @throws ConfigError when a value is out of range
 */
export function resolveServerConfig(options: ServerConfigOptions = {}): ServerConfig {
  const defaults = defaultServerConfig();
  const decoder = options.decoder ?? {};
  const config: ServerConfig = {
    development: options.development ?? defaults.development,
    decodingErrorLevel: options.decodingErrorLevel ?? defaults.decodingErrorLevel,
    idleTimeoutMs: options.idleTimeoutMs ?? defaults.idleTimeoutMs,
    maxContentLength: options.maxContentLength ?? defaults.maxContentLength,
    bodyHighWatermark: options.bodyHighWatermark ?? defaults.bodyHighWatermark,
    bodyLowWatermark: options.bodyLowWatermark ?? defaults.bodyLowWatermark,
    decoder: {
      maxInitialLineLength: decoder.maxInitialLineLength ?? defaults.decoder.maxInitialLineLength,
      maxHeaderSize: decoder.maxHeaderSize ?? defaults.decoder.maxHeaderSize,
      maxChunkSize: decoder.maxChunkSize ?? defaults.decoder.maxChunkSize,
    },
  };

  if (!isDecodingErrorLevel(config.decodingErrorLevel)) {
    throw new ConfigError("decodingErrorLevel", `unknown level ${String(config.decodingErrorLevel)}`);
  }
  requireNonNegativeInteger("idleTimeoutMs", config.idleTimeoutMs);
  requireNonNegativeInteger("maxContentLength", config.maxContentLength);
  requirePositiveInteger("bodyHighWatermark", config.bodyHighWatermark);
  requireNonNegativeInteger("bodyLowWatermark", config.bodyLowWatermark);
  if (config.bodyLowWatermark > config.bodyHighWatermark) {
    throw new ConfigError("bodyLowWatermark", "must not exceed bodyHighWatermark");
  }
  requirePositiveInteger("decoder.maxInitialLineLength", config.decoder.maxInitialLineLength);
  requirePositiveInteger("decoder.maxHeaderSize", config.decoder.maxHeaderSize);
  requirePositiveInteger("decoder.maxChunkSize", config.decoder.maxChunkSize);

  return config;
}

function parseInteger(key: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(key, `expected an integer, got "${raw}"`);
  }
  return Number(raw.trim());
}

/**
 * Read overrides from environment variables:
 *
 * - `SKIFF_DEVELOPMENT`: "true"/"1" or "false"/"0"
 * - `SKIFF_DECODING_ERROR_LEVEL`: one of full, error, warn, info, silent
 * - `SKIFF_IDLE_TIMEOUT_MS`
 * - `SKIFF_MAX_CONTENT_LENGTH`
 *
 * Unset variables are left out of the result.
 */
export function serverConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): ServerConfigOptions {
  const options: ServerConfigOptions = {};

  const development = env.SKIFF_DEVELOPMENT;
  if (development !== undefined) {
    const value = development.trim().toLowerCase();
    if (value === "true" || value === "1") {
      options.development = true;
    } else if (value === "false" || value === "0") {
      options.development = false;
    } else {
      throw new ConfigError("SKIFF_DEVELOPMENT", `expected a boolean, got "${development}"`);
    }
  }

  const level = env.SKIFF_DECODING_ERROR_LEVEL;
  if (level !== undefined) {
    const value = level.trim().toLowerCase();
    if (!isDecodingErrorLevel(value)) {
      throw new ConfigError("SKIFF_DECODING_ERROR_LEVEL", `unknown level "${level}"`);
    }
    options.decodingErrorLevel = value;
  }

  const idle = env.SKIFF_IDLE_TIMEOUT_MS;
  if (idle !== undefined) {
    options.idleTimeoutMs = parseInteger("SKIFF_IDLE_TIMEOUT_MS", idle);
  }

  const maxContentLength = env.SKIFF_MAX_CONTENT_LENGTH;
  if (maxContentLength !== undefined) {
    options.maxContentLength = parseInteger("SKIFF_MAX_CONTENT_LENGTH", maxContentLength);
  }

  return options;
}
