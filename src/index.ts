// src/index.ts — Library API
// The probes and runners behind the cmake-devkit CLI, usable from other tools.

// Re-export all public types
export type {
  Warning,
  Settings,
  SettingKey,
  ToolchainFlavor,
  VersionTuple,
  CompilerReport,
  ResolvedEnvironment,
  SdkCandidate,
  Host,
  RunOptions,
} from "./types.js";
export type { ParsedArgs, CommandName } from "./cli.js";
export type { Invocation, SettingsStoreOptions, SettingsLocation } from "./settings.js";
export type { EnvironmentProbeOptions, VisualStudioInstall } from "./environment-probe.js";
export type { TargetQuery } from "./targets.js";
export type { BuildOptions, ConfigureOptions, DownloadOptions, EnsureQtOptions, LogFn } from "./build-runner.js";
export type { VerifyReport } from "./verify.js";
export type { FetchFn, LatestVersion, UpdateReport } from "./update-check.js";
export type { CommandContext } from "./commands.js";

export {
  TOOL_VERSION,
  SETTING_KEYS,
  ToolchainMismatchError,
  CommandFailedError,
  ExecutableNotFoundError,
  ConfigurationConflictError,
  SettingsError,
} from "./types.js";

// Versions
export {
  parseVersionTuple,
  parseVersionFromPathSegments,
  compareVersionTuples,
  compareVersions,
  selectLatest,
  formatVersionTuple,
  extractVersionsFromListing,
} from "./version.js";

// Settings
export {
  SettingsStore,
  settingsFilePath,
  createDefaultSettings,
  normalizeSetting,
  parseSettingAssignment,
  formatSettings,
  resolveInvocation,
} from "./settings.js";

// Environment
export { createNodeHost, findOnPath } from "./host.js";
export { EnvironmentProbe, detectSdkFlavor, sdkLibraryDirs } from "./environment-probe.js";
export { packageInstallHint, compilerInstallHint, detectPackageManager } from "./package-hints.js";

// Targets & builds
export {
  discoverRunnableTargets,
  isRunnableTargetName,
  locateBuiltExecutable,
  isMultiConfigGenerator,
  readGeneratorFromCache,
  effectiveConfig,
} from "./targets.js";
export {
  runCommand,
  configureProject,
  buildTargets,
  runTests,
  downloadQt,
  ensureQtPrefix,
  reconcileCachedGenerator,
} from "./build-runner.js";

// Reports & CLI
export { verifyEnvironment } from "./verify.js";
export { checkLibraryUpdates, fetchLatestQtVersion } from "./update-check.js";
export { parseCliArgs, CliUsageError } from "./cli.js";
export { executeCommand } from "./commands.js";
