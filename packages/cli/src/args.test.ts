import { describe, expect, it } from "vitest";
import { parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("serves at info level by default", () => {
    expect(parseArgs([])).toEqual({ kind: "serve", logLevel: "info", quiet: false });
  });

  it("lowers logging with --quiet", () => {
    expect(parseArgs(["-q"])).toEqual({ kind: "serve", logLevel: "warn", quiet: true });
  });

  it("raises logging with --verbose", () => {
    expect(parseArgs(["--verbose"])).toEqual({
      kind: "serve",
      logLevel: "debug",
      quiet: false,
    });
  });

  it("takes an explicit --log-level", () => {
    expect(parseArgs(["--log-level", "error"])).toEqual({
      kind: "serve",
      logLevel: "error",
      quiet: false,
    });
  });

  it("rejects an unknown log level", () => {
    expect(parseArgs(["--log-level", "loud"])).toEqual({
      kind: "error",
      message: "Invalid log level: loud",
    });
    expect(parseArgs(["--log-level"])).toEqual({
      kind: "error",
      message: "Invalid log level: ",
    });
  });

  it("does not accept an address or root override", () => {
    expect(parseArgs(["--port", "9000"])).toEqual({
      kind: "error",
      message: "Unknown option: --port",
    });
    expect(parseArgs(["./site"])).toEqual({
      kind: "error",
      message: "Unknown option: ./site",
    });
  });

  it("short-circuits on --help and --version", () => {
    expect(parseArgs(["-q", "--help"])).toEqual({ kind: "help" });
    expect(parseArgs(["-v"])).toEqual({ kind: "version" });
  });
});
