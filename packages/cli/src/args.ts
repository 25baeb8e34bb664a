import { isLogLevel, type LogLevel } from "@rawhttp/engine";

export type CliCommand =
  | { kind: "serve"; logLevel: LogLevel; quiet: boolean }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export const HELP_TEXT = `
rawhttp - serve ./public over HTTP/1.1 on 127.0.0.1:8080

Usage: rawhttp [options]

Options:
  --quiet, -q            Only log warnings and errors
  --verbose, -V          Also log raw requests (same as --log-level debug)
  --log-level <level>    One of debug, info, warn, error (default: info)
  --version, -v          Show version
  --help, -h             Show this help
`;

export function parseArgs(args: string[]): CliCommand {
  let logLevel: LogLevel = "info";
  let quiet = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--quiet" || arg === "-q") {
      quiet = true;
      logLevel = "warn";
    } else if (arg === "--verbose" || arg === "-V") {
      logLevel = "debug";
    } else if (arg === "--log-level") {
      const value = args[++i];
      if (value === undefined || !isLogLevel(value)) {
        return { kind: "error", message: `Invalid log level: ${value ?? ""}` };
      }
      logLevel = value;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  return { kind: "serve", logLevel, quiet };
}
