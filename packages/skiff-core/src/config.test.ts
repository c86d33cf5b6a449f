import { describe, expect, it } from "vitest";

import {
  ConfigError,
  defaultServerConfig,
  resolveServerConfig,
  serverConfigFromEnv,
} from "./config.ts";

describe("resolveServerConfig", () => {
  it("returns the defaults when given nothing", () => {
    expect(resolveServerConfig()).toEqual(defaultServerConfig());
    expect(defaultServerConfig()).toMatchObject({
      development: false,
      decodingErrorLevel: "warn",
      idleTimeoutMs: 0,
      maxContentLength: 1048576,
    });
  });

  it("merges overrides, including partial decoder limits", () => {
    const config = resolveServerConfig({ development: true, decoder: { maxChunkSize: 1024 } });
    expect(config.development).toBe(true);
    expect(config.decoder).toEqual({
      maxInitialLineLength: 4096,
      maxHeaderSize: 8192,
      maxChunkSize: 1024,
    });
  });

  it("ignores explicitly undefined overrides", () => {
    expect(resolveServerConfig({ idleTimeoutMs: undefined }).idleTimeoutMs).toBe(0);
  });

  it("rejects out-of-range values", () => {
    expect(() => resolveServerConfig({ idleTimeoutMs: -1 })).toThrow(ConfigError);
    expect(() => resolveServerConfig({ bodyHighWatermark: 0 })).toThrow(
      "invalid config bodyHighWatermark: expected a positive integer, got 0",
    );
    expect(() => resolveServerConfig({ bodyHighWatermark: 10, bodyLowWatermark: 20 })).toThrow(
      "invalid config bodyLowWatermark: must not exceed bodyHighWatermark",
    );
  });
});

describe("serverConfigFromEnv", () => {
  it("reads the SKIFF_ variables", () => {
    expect(
      serverConfigFromEnv({
        SKIFF_DEVELOPMENT: "true",
        SKIFF_DECODING_ERROR_LEVEL: "INFO",
        SKIFF_IDLE_TIMEOUT_MS: "30000",
        SKIFF_MAX_CONTENT_LENGTH: "2048",
      }),
    ).toEqual({
      development: true,
      decodingErrorLevel: "info",
      idleTimeoutMs: 30000,
      maxContentLength: 2048,
    });
  });

  it("leaves unset variables out", () => {
    expect(serverConfigFromEnv({ SKIFF_DEVELOPMENT: "0" })).toEqual({ development: false });
  });

  it("rejects malformed values", () => {
    expect(() => serverConfigFromEnv({ SKIFF_DEVELOPMENT: "maybe" })).toThrow(ConfigError);
    expect(() => serverConfigFromEnv({ SKIFF_DECODING_ERROR_LEVEL: "loud" })).toThrow(
      'invalid config SKIFF_DECODING_ERROR_LEVEL: unknown level "loud"',
    );
    expect(() => serverConfigFromEnv({ SKIFF_IDLE_TIMEOUT_MS: "5s" })).toThrow(ConfigError);
  });
});
