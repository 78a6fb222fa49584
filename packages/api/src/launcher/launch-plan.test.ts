import { describe, it, expect } from "vitest";
import {
  DEFAULT_PORT,
  MANAGED_TUNING,
  STATIC_TUNING,
  parsePort,
  parseVariant,
  resolveLaunchPlan,
} from "./launch-plan.js";
import { LaunchConfigError } from "../errors.js";

// ---------------------------------------------------------------------------
// parseVariant
// ---------------------------------------------------------------------------

describe("parseVariant", () => {
  it("defaults to managed", () => {
    expect(parseVariant(undefined)).toBe("managed");
    expect(parseVariant("")).toBe("managed");
  });

  it.each(["managed", "direct", "static"] as const)("accepts %s", (name) => {
    expect(parseVariant(name)).toBe(name);
  });

  it("rejects unknown variants", () => {
    expect(() => parseVariant("cluster")).toThrow(
      'Unknown launch variant "cluster". Expected one of: managed, direct, static.',
    );
    expect(() => parseVariant("toString")).toThrow(LaunchConfigError);
  });
});

// ---------------------------------------------------------------------------
// parsePort
// ---------------------------------------------------------------------------

describe("parsePort", () => {
  it("accepts the full TCP range", () => {
    expect(parsePort("0", true)).toBe(0);
    expect(parsePort("1", true)).toBe(1);
    expect(parsePort("65535", true)).toBe(65535);
    expect(parsePort(" 9000 ", true)).toBe(9000);
  });

  it.each(["abc", "65536", "-1", "80.5", "1e3", "0x50"])("rejects %j", (raw) => {
    expect(() => parsePort(raw, false)).toThrow(
      `Invalid PORT value "${raw}". Expected an integer between 0 and 65535.`,
    );
  });

  it("defaults to 8080 when optional", () => {
    expect(parsePort(undefined, false)).toBe(DEFAULT_PORT);
    expect(parsePort("  ", false)).toBe(8080);
  });

  it("fails when required and unset", () => {
    expect(() => parsePort(undefined, true)).toThrow(LaunchConfigError);
    expect(() => parsePort("", true)).toThrow(
      "PORT is required and has no default for this variant.",
    );
  });
});

// ---------------------------------------------------------------------------
// resolveLaunchPlan
// ---------------------------------------------------------------------------

describe("resolveLaunchPlan", () => {
  it("requires PORT for managed", () => {
    expect(() => resolveLaunchPlan("managed", {})).toThrow(LaunchConfigError);
  });

  it("builds the managed plan with its tuning", () => {
    expect(resolveLaunchPlan("managed", { PORT: "9000" })).toEqual({
      variant: "managed",
      host: "0.0.0.0",
      port: 9000,
      tuning: {
        maxConcurrentRequests: 2,
        requestTimeoutMs: 30_000,
        gracefulShutdownMs: 10_000,
        keepAliveMs: 65_000,
      },
    });
    expect(MANAGED_TUNING.maxConcurrentRequests).toBe(2);
  });

  it("defaults direct and static to port 8080", () => {
    expect(resolveLaunchPlan("direct", {}).port).toBe(8080);
    expect(resolveLaunchPlan("static", {})).toEqual({
      variant: "static",
      host: "0.0.0.0",
      port: 8080,
      tuning: STATIC_TUNING,
    });
  });

  it("gives direct no tuning", () => {
    expect(resolveLaunchPlan("direct", {}).tuning).toEqual({});
  });

  it("still validates PORT for defaulted variants", () => {
    expect(() => resolveLaunchPlan("static", { PORT: "http" })).toThrow(LaunchConfigError);
  });

  it("honours HOST", () => {
    expect(resolveLaunchPlan("direct", { HOST: "127.0.0.1" }).host).toBe("127.0.0.1");
    expect(resolveLaunchPlan("direct", { HOST: " " }).host).toBe("0.0.0.0");
  });
});
