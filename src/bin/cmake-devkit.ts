#!/usr/bin/env node
// CLI entry point for cmake-devkit

import { resolve } from "node:path";
import { CliUsageError, HELP_TEXT, parseCliArgs } from "../cli.js";
import type { ParsedArgs } from "../cli.js";
import { executeCommand, exitCodeFor } from "../commands.js";
import { createNodeHost } from "../host.js";
import { SettingsStore, createDefaultSettings, settingsFilePath } from "../settings.js";
import { TOOL_VERSION } from "../types.js";

function stdout(line: string): void {
  process.stdout.write(line + "\n");
}

function stderr(line: string): void {
  process.stderr.write(line + "\n");
}

async function main(): Promise<number> {
  let args: ParsedArgs;
  try {
    args = await parseCliArgs(process.argv.slice(2));
  } catch (err: unknown) {
    if (!(err instanceof CliUsageError)) throw err;
    stderr(`[error] ${err.message}`);
    stderr(HELP_TEXT);
    return 2;
  }

  if (args.help) {
    stdout(`${HELP_TEXT}\n\nVersion: ${TOOL_VERSION}`);
    return 0;
  }

  const host = createNodeHost();
  const projectRoot = resolve(args.sourceDir ?? process.cwd());
  const store = new SettingsStore({
    filePath: settingsFilePath(host),
    defaults: createDefaultSettings(projectRoot),
    homeDir: host.homeDir,
  });
  store.load();

  try {
    return await executeCommand(args, { host, store, projectRoot, out: stdout, log: stderr });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    stderr(`[error] ${msg}`);
    return exitCodeFor(err);
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  });
