// src/build-runner.ts — CMake configure/build, CTest and Qt download invocations
// Each command is logged, run to completion, and a non-zero exit becomes CommandFailedError.

import { existsSync, mkdirSync, rmSync, statSync } from "node:fs";
import { join } from "node:path";
import type { EnvironmentProbe } from "./environment-probe.js";
import { effectiveConfig, readGeneratorFromCache } from "./targets.js";
import type { Host } from "./types.js";
import { CommandFailedError, ConfigurationConflictError } from "./types.js";

export type LogFn = (line: string) => void;

export const QT_DOWNLOADER_ENV = "CMAKE_DEVKIT_QT_DOWNLOADER";

function stderr(line: string): void {
  process.stderr.write(line + "\n");
}

function quoteArg(arg: string): string {
  return /[\s"]/.test(arg) ? JSON.stringify(arg) : arg;
}

/** Log and run a command; throws CommandFailedError on a non-zero exit. */
export function runCommand(
  host: Host,
  argv: string[],
  options: { cwd?: string; log?: LogFn } = {},
): void {
  const log = options.log ?? stderr;
  const display = argv.map(quoteArg).join(" ");
  log(options.cwd ? `\n>>> (cd ${options.cwd}) ${display}` : `\n>>> ${display}`);
  const exitCode = host.run(argv, { cwd: options.cwd });
  if (exitCode !== 0) throw new CommandFailedError(argv, exitCode);
}

// ─── Configure ───────────────────────────────────────────────────────────────

/**
 * Reconcile the requested generator with the one already cached in `buildDir`.
 * A cached generator is reused unless the user explicitly asked for a
 * different one, which CMake cannot switch to in place.
 */
export function reconcileCachedGenerator(
  buildDir: string,
  requested: string | undefined,
  strict: boolean,
  log: LogFn = stderr,
): string | undefined {
  const cached = readGeneratorFromCache(buildDir);
  if (!cached) return requested;

  if (!requested) {
    log(`Reusing cached CMake generator '${cached}' from build directory ${buildDir}`);
    return cached;
  }
  if (cached === requested) return requested;

  const message =
    `Build directory ${buildDir} was configured with generator '${cached}', ` +
    `but '${requested}' was requested.`;
  if (!strict) {
    log(`${message} Reusing cached generator.`);
    return cached;
  }
  throw new ConfigurationConflictError(
    `${message} Delete or choose a different --build-dir (or pass --fresh) to switch generators, ` +
      "or rerun without --generator to reuse the cached generator.",
  );
}

export interface ConfigureOptions {
  sourceDir: string;
  buildDir: string;
  generator?: string;
  buildType: string;
  qtPrefix?: string;
  /** True when the generator came from --generator or $CMAKE_GENERATOR. */
  generatorIsStrict: boolean;
  /** Remove an existing build directory before configuring. */
  fresh?: boolean;
  log?: LogFn;
}

/** Run the CMake configure step; returns the generator actually used. */
export function configureProject(host: Host, options: ConfigureOptions): string | undefined {
  const { sourceDir, buildDir, buildType, qtPrefix } = options;
  const log = options.log ?? stderr;

  if (existsSync(buildDir) && !statSync(buildDir).isDirectory()) {
    throw new ConfigurationConflictError(`Build path exists and is not a directory: ${buildDir}`);
  }
  if (options.fresh && existsSync(buildDir)) {
    log(`Clearing existing build directory: ${buildDir}`);
    rmSync(buildDir, { recursive: true, force: true });
  }

  const generator = reconcileCachedGenerator(buildDir, options.generator, options.generatorIsStrict, log);
  mkdirSync(buildDir, { recursive: true });

  const argv = ["cmake", "-S", sourceDir, "-B", buildDir];
  if (generator) argv.push("-G", generator);
  if (qtPrefix) argv.push(`-DCMAKE_PREFIX_PATH=${qtPrefix}`);
  if (buildType) argv.push(`-DCMAKE_BUILD_TYPE=${buildType}`);

  runCommand(host, argv, { log });
  return generator;
}

// ─── Build & test ────────────────────────────────────────────────────────────

export interface BuildOptions {
  buildDir: string;
  generator?: string;
  buildType: string;
  configOverride?: string;
  log?: LogFn;
}

export function buildTargets(host: Host, options: BuildOptions, targets: readonly string[] = []): void {
  const { buildDir, generator, buildType, configOverride } = options;
  const config = effectiveConfig(buildDir, generator, buildType, configOverride);

  const argv = ["cmake", "--build", buildDir];
  if (targets.length > 0) argv.push("--target", ...targets);
  if (config) argv.push("--config", config);
  runCommand(host, argv, { log: options.log });
}

export function runTests(host: Host, options: BuildOptions, extraArgs: readonly string[] = []): void {
  const { buildDir, generator, buildType, configOverride } = options;
  const config = effectiveConfig(buildDir, generator, buildType, configOverride);

  const argv = ["ctest", "--test-dir", buildDir];
  if (config) argv.push("-C", config);
  argv.push(...extraArgs);
  runCommand(host, argv, { log: options.log });
}

// ─── Qt download ─────────────────────────────────────────────────────────────

export interface DownloadOptions {
  projectRoot: string;
  qtVersion?: string;
  compiler?: string;
  outputDir?: string;
  baseUrl?: string;
  withTools?: boolean;
  log?: LogFn;
}

export const DEFAULT_QT_DOWNLOADER = ["scripts", "download-qt6"];

/**
 * Download helper command: $CMAKE_DEVKIT_QT_DOWNLOADER (whitespace-separated)
 * or the project's scripts/download-qt6.
 */
export function downloaderCommand(host: Host, projectRoot: string): string[] {
  const override = host.env[QT_DOWNLOADER_ENV]?.trim();
  if (override) return override.split(/\s+/);
  return [join(projectRoot, ...DEFAULT_QT_DOWNLOADER)];
}

export function downloadQt(host: Host, options: DownloadOptions): void {
  const argv = downloaderCommand(host, options.projectRoot);
  if (options.qtVersion) argv.push("--qt-version", options.qtVersion);
  if (options.compiler) argv.push("--compiler", options.compiler);
  if (options.outputDir) argv.push("--output-dir", options.outputDir);
  if (options.baseUrl) argv.push("--base-url", options.baseUrl);
  if (options.withTools) argv.push("--with-tools");

  const log = options.log ?? stderr;
  log("Downloading Qt with the download helper...");
  runCommand(host, argv, { log });
}

/** MinGW toolchains need the MinGW Qt build; everything else takes the helper's default. */
export function defaultDownloadCompiler(probe: EnvironmentProbe, host: Host, generator?: string): string | undefined {
  if (host.platform !== "win32") return undefined;
  return probe.resolveCompilerFlavor(generator) === "mingw" ? "win64_mingw" : undefined;
}

export interface EnsureQtOptions {
  projectRoot: string;
  qtPrefix?: string;
  generator?: string;
  downloadIfMissing: boolean;
  downloadVersion?: string;
  downloadCompiler?: string;
  downloadOutputDir: string;
  log?: LogFn;
}

/** Resolve the Qt prefix, downloading Qt first when asked to and nothing is found. */
export function ensureQtPrefix(probe: EnvironmentProbe, host: Host, options: EnsureQtOptions): string | undefined {
  const found = probe.resolveSdkPrefix(options.qtPrefix, options.generator);
  if (found || !options.downloadIfMissing) return found;

  downloadQt(host, {
    projectRoot: options.projectRoot,
    qtVersion: options.downloadVersion,
    compiler: options.downloadCompiler ?? defaultDownloadCompiler(probe, host, options.generator),
    outputDir: options.downloadOutputDir,
    log: options.log,
  });
  return probe.resolveSdkPrefix(options.qtPrefix, options.generator);
}
