import { describe, it, expect } from "vitest";
import { resolveConfig } from "../src/config.ts";

describe("resolveConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveConfig({}, {})).toEqual({
      port: 4566,
      logger: true,
      host: "127.0.0.1",
      defaultRegion: "us-east-1",
      deliveryTimeoutMs: 5000,
      deliveryConcurrency: 8,
      init: undefined,
    });
  });

  it("reads FANOUT_* variables", () => {
    const config = resolveConfig(
      {},
      {
        FANOUT_PORT: "4000",
        FANOUT_LOGGER: "false",
        FANOUT_DEFAULT_REGION: "eu-west-1",
        FANOUT_DELIVERY_TIMEOUT_MS: "250",
        FANOUT_DELIVERY_CONCURRENCY: "2",
        FANOUT_INIT: "/tmp/init.json",
      },
    );
    expect(config).toMatchObject({
      port: 4000,
      logger: false,
      defaultRegion: "eu-west-1",
      deliveryTimeoutMs: 250,
      deliveryConcurrency: 2,
      init: "/tmp/init.json",
    });
  });

  it("prefers explicit options", () => {
    const config = resolveConfig({ port: 0, logger: true }, { FANOUT_PORT: "4000", FANOUT_LOGGER: "false" });
    expect(config.port).toBe(0);
    expect(config.logger).toBe(true);
  });

  it("rejects values that are not integers", () => {
    expect(() => resolveConfig({}, { FANOUT_PORT: "abc" })).toThrow(
      'FANOUT_PORT must be a non-negative integer, got "abc"',
    );
    expect(() => resolveConfig({}, { FANOUT_DELIVERY_TIMEOUT_MS: "-1" })).toThrow(
      'FANOUT_DELIVERY_TIMEOUT_MS must be a non-negative integer, got "-1"',
    );
  });
});
