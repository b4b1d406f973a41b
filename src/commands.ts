// src/commands.ts — Verb dispatch
// Wires parsed args, settings and the environment probe to the build runner.

import { resolve } from "node:path";
import {
  buildTargets,
  configureProject,
  defaultDownloadCompiler,
  downloadQt,
  ensureQtPrefix,
  runCommand,
  runTests,
} from "./build-runner.js";
import type { BuildOptions, LogFn } from "./build-runner.js";
import { CliUsageError } from "./cli.js";
import type { ParsedArgs } from "./cli.js";
import { EnvironmentProbe } from "./environment-probe.js";
import {
  expandHome,
  formatSettings,
  isSettingKey,
  parseSettingAssignment,
  resolveInvocation,
} from "./settings.js";
import type { Invocation, SettingsStore } from "./settings.js";
import { discoverRunnableTargets, locateBuiltExecutable } from "./targets.js";
import type { Host, Warning } from "./types.js";
import { CommandFailedError } from "./types.js";
import { checkLibraryUpdates } from "./update-check.js";
import type { FetchFn } from "./update-check.js";
import { verifyEnvironment } from "./verify.js";

export interface CommandContext {
  host: Host;
  store: SettingsStore;
  projectRoot: string;
  /** Reports (verify, settings) go here. */
  out: LogFn;
  /** Progress lines and warnings go here. */
  log: LogFn;
  fetch?: FetchFn;
}

export function formatWarning(w: Warning): string {
  return `[${w.level}] ${w.module}: ${w.message}`;
}

/** Process exit code for an error escaping a command. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof CommandFailedError) return err.exitCode;
  if (err instanceof CliUsageError) return 2;
  return 1;
}

/**
 * Run one CLI verb and return its exit code. Probe warnings are flushed to
 * `log` whether the command succeeds or throws.
 */
export async function executeCommand(args: ParsedArgs, ctx: CommandContext): Promise<number> {
  const { host, store } = ctx;
  const invocation = resolveInvocation(args, store.snapshot(), host.homeDir);
  const probe = new EnvironmentProbe({
    host,
    projectRoot: ctx.projectRoot,
    sdkRoot: invocation.downloadQtOutputDir,
  });

  try {
    return await dispatch(args, invocation, probe, ctx);
  } finally {
    for (const w of probe.warnings) {
      if (args.quiet && w.level === "info") continue;
      ctx.log(formatWarning(w));
    }
  }
}

async function dispatch(
  args: ParsedArgs,
  invocation: Invocation,
  probe: EnvironmentProbe,
  ctx: CommandContext,
): Promise<number> {
  const { host } = ctx;

  switch (args.command) {
    case "settings":
      return runSettings(args, ctx);

    case "download-qt":
      downloadQt(host, {
        projectRoot: ctx.projectRoot,
        qtVersion: args.qtVersion ?? invocation.downloadQtVersion,
        compiler: args.compiler ?? invocation.downloadQtCompiler ?? defaultDownloadCompiler(probe, host),
        outputDir: args.outputDir ? resolve(expandHome(args.outputDir, host.homeDir)) : invocation.downloadQtOutputDir,
        baseUrl: args.baseUrl,
        withTools: args.withTools,
        log: ctx.log,
      });
      return 0;

    case "verify": {
      const qtPrefix = prepareQtPrefix(invocation, probe, ctx, probe.resolveGenerator(invocation.generator));
      const report = verifyEnvironment(probe, host, qtPrefix, invocation.generator);
      for (const line of report.lines) ctx.out(line);
      return report.ok ? 0 : 1;
    }

    case "check-updates": {
      const qtPrefix = prepareQtPrefix(invocation, probe, ctx, probe.resolveGenerator(invocation.generator));
      const report = await checkLibraryUpdates(probe, qtPrefix, { fetch: ctx.fetch });
      for (const line of report.lines) ctx.out(line);
      return report.ok ? 0 : 1;
    }

    case "build":
    case "test":
    case "run":
      return runBuildCommand(args, invocation, probe, ctx);
  }
}

/** Resolve Qt, downloading it first when the invocation asks for that. */
function prepareQtPrefix(
  invocation: Invocation,
  probe: EnvironmentProbe,
  ctx: CommandContext,
  generator: string | undefined,
): string | undefined {
  return ensureQtPrefix(probe, ctx.host, {
    projectRoot: ctx.projectRoot,
    qtPrefix: invocation.qtPrefix,
    generator,
    downloadIfMissing: invocation.downloadQtIfMissing,
    downloadVersion: invocation.downloadQtVersion,
    downloadCompiler: invocation.downloadQtCompiler,
    downloadOutputDir: invocation.downloadQtOutputDir,
    log: ctx.log,
  });
}

function runSettings(args: ParsedArgs, ctx: CommandContext): number {
  const { store } = ctx;
  const updates: Record<string, string> = {};
  for (const item of args.set) {
    const [key, value] = parseSettingAssignment(item);
    if (!isSettingKey(key)) {
      ctx.log(`[warn] settings: Unknown setting "${key}" ignored`);
      continue;
    }
    updates[key] = value;
  }
  for (const key of args.unset) {
    if (!isSettingKey(key)) ctx.log(`[warn] settings: Unknown setting "${key}" ignored`);
  }

  const edited = args.set.length > 0 || args.unset.length > 0;
  if (edited) {
    store.set(updates, args.unset);
    if (!args.quiet) ctx.log("Updated settings.");
  }
  // --quiet silences the echo after edits; --print brings it back
  if (!edited || !args.quiet || args.print) ctx.out(formatSettings(store.snapshot(), store.filePath));
  return 0;
}

function runBuildCommand(
  args: ParsedArgs,
  invocation: Invocation,
  probe: EnvironmentProbe,
  ctx: CommandContext,
): number {
  const { host, log } = ctx;
  const detected = probe.resolveGenerator(invocation.generator);
  const generatorIsStrict = Boolean(invocation.generator || host.env.CMAKE_GENERATOR);

  const qtPrefix = prepareQtPrefix(invocation, probe, ctx, detected);
  probe.enforceToolchainMatch(qtPrefix, detected);

  const generator = configureProject(host, {
    sourceDir: ctx.projectRoot,
    buildDir: invocation.buildDir,
    generator: detected,
    buildType: invocation.buildType,
    qtPrefix,
    generatorIsStrict,
    fresh: args.fresh,
    log,
  });

  const buildOptions: BuildOptions = {
    buildDir: invocation.buildDir,
    generator,
    buildType: invocation.buildType,
    configOverride: invocation.config,
    log,
  };

  if (args.command === "build") {
    buildTargets(host, buildOptions, args.targets);
    return 0;
  }

  if (args.command === "test") {
    buildTargets(host, buildOptions);
    runTests(host, buildOptions, args.passthrough);
    return 0;
  }

  const query = {
    buildDir: invocation.buildDir,
    generator,
    buildType: invocation.buildType,
    configOverride: invocation.config,
  };
  let target = args.positionals[0];
  if (!target) {
    const configured = ctx.store.defaultRunTargets();
    const available = discoverRunnableTargets(host, query, configured);
    target = configured[0] ?? available[0];
    if (!target) {
      throw new CliUsageError("No runnable targets found. Pass a target name: cmake-devkit run <target>");
    }
    const source = configured.length > 0 ? "configured" : "discovered";
    log(`Running first ${source} target: ${target} (available: ${available.join(", ")})`);
  }

  if (!args.skipBuild) buildTargets(host, buildOptions, [target]);
  const exePath = locateBuiltExecutable({ ...query, target, platform: host.platform }, probe.warnings);
  runCommand(host, [exePath, ...args.passthrough], { log });
  return 0;
}
