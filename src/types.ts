// src/types.ts — Shared types for cmake-devkit
// Settings, probe results, host abstraction, and error classes.

export const TOOL_VERSION = "0.3.0";

// ─── Warnings (collected by every module, printed by the bin) ───────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Settings ───────────────────────────────────────────────────────────────

export interface Settings {
  build_dir: string;
  build_type: string;
  qt_prefix: string | null;
  generator: string | null;
  download_qt_output_dir: string;
  download_qt_version: string | null;
  download_qt_compiler: string | null;
  default_run_targets: string[];
}

export type SettingKey = keyof Settings;

export const SETTING_KEYS: readonly SettingKey[] = [
  "build_dir",
  "build_type",
  "qt_prefix",
  "generator",
  "download_qt_output_dir",
  "download_qt_version",
  "download_qt_compiler",
  "default_run_targets",
];

// ─── Environment probing ────────────────────────────────────────────────────

export type ToolchainFlavor = "msvc" | "mingw";

/** Version numbers in order of appearance; empty when nothing parsed. */
export type VersionTuple = number[];

export interface CompilerReport {
  description?: string;
  /** Present when the compiler is missing or needs extra setup. */
  hint?: string;
  libraryDirs: string[];
}

export interface ResolvedEnvironment {
  generator?: string;
  compiler: CompilerReport;
  qtPrefix?: string;
}

export interface SdkCandidate {
  prefix: string;
  version: VersionTuple;
  flavor?: ToolchainFlavor;
}

// ─── Host (everything the probes read from the machine) ─────────────────────

export interface RunOptions {
  cwd?: string;
}

export interface Host {
  platform: NodeJS.Platform;
  env: Record<string, string | undefined>;
  homeDir: string;
  /** Resolve an executable on PATH. */
  which(command: string): string | undefined;
  /** Run a command and return its stdout, or undefined when it fails to start or exits non-zero. */
  capture(argv: string[], options?: RunOptions): string | undefined;
  /** Run a command with inherited stdio and return its exit code. */
  run(argv: string[], options?: RunOptions): number;
}

// ─── Errors ─────────────────────────────────────────────────────────────────

export class ToolchainMismatchError extends Error {
  constructor(
    public readonly qtPrefix: string,
    public readonly qtFlavor: ToolchainFlavor,
    public readonly compilerFlavor: ToolchainFlavor,
  ) {
    super(
      `Qt install ${qtPrefix} looks like ${qtFlavor.toUpperCase()}, ` +
        `but your compiler/generator looks like ${compilerFlavor.toUpperCase()}.\n` +
        "Use a matching Qt download (e.g. cmake-devkit download-qt --compiler win64_mingw) " +
        "or switch to the corresponding toolchain/generator.",
    );
    this.name = "ToolchainMismatchError";
  }
}

export class CommandFailedError extends Error {
  constructor(
    public readonly argv: string[],
    public readonly exitCode: number,
  ) {
    super(`Command failed with exit code ${exitCode}: ${argv.join(" ")}`);
    this.name = "CommandFailedError";
  }
}

export class ExecutableNotFoundError extends Error {
  constructor(
    public readonly target: string,
    public readonly searchRoot: string,
  ) {
    super(`Executable for target '${target}' not found in ${searchRoot}`);
    this.name = "ExecutableNotFoundError";
  }
}

export class ConfigurationConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationConflictError";
  }
}

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}
