import * as fs from "node:fs";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  filteredLogger,
  prefixedLogger,
} from "@rawhttp/engine";
import { HELP_TEXT, parseArgs } from "./args.js";

function readVersion(): string {
  const raw = fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  const pkg: unknown = JSON.parse(raw);
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));

  switch (command.kind) {
    case "help":
      console.log(HELP_TEXT);
      return;
    case "version":
      console.log(readVersion());
      return;
    case "error":
      console.error(command.message);
      console.log(HELP_TEXT);
      process.exitCode = 1;
      return;
  }

  const logger = filteredLogger(
    command.logLevel,
    prefixedLogger("rawhttp", basicLogger()),
  );
  const config = { ...defaultConfig(), quiet: command.quiet };
  const server = createNodeServer({ config, logger });

  const port = await server.start().catch((err: unknown) => {
    logger.error(
      `Failed to bind to address ${config.host}:${config.port}:`,
      err instanceof Error ? err.message : err,
    );
    return process.exit(1);
  });

  console.log(`\n  rawhttp serving ${config.root}/\n`);
  console.log(`  Local:   http://${config.host}:${port}`);
  console.log();
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
