// src/cli.ts — Command-line parsing
// mri for flags; everything after a bare "--" is passed through untouched.

export const COMMANDS = ["build", "test", "run", "verify", "check-updates", "download-qt", "settings"] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface ParsedArgs {
  command: CommandName;
  /** Positionals after the command (e.g. the `run` target). */
  positionals: string[];
  /** Arguments after "--", for ctest or the executable. */
  passthrough: string[];
  buildDir?: string;
  buildType?: string;
  config?: string;
  qtPrefix?: string;
  generator?: string;
  sourceDir?: string;
  downloadQtIfMissing: boolean;
  downloadQtVersion?: string;
  downloadQtCompiler?: string;
  downloadQtOutputDir?: string;
  targets: string[];
  skipBuild: boolean;
  fresh: boolean;
  // download-qt
  qtVersion?: string;
  compiler?: string;
  outputDir?: string;
  baseUrl?: string;
  withTools: boolean;
  // settings
  set: string[];
  unset: string[];
  print: boolean;
  quiet: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const BOOLEAN_FLAGS = ["download-qt-if-missing", "skip-build", "fresh", "with-tools", "print", "quiet", "help"];
const STRING_FLAGS = [
  "build-dir",
  "build-type",
  "config",
  "qt-prefix",
  "generator",
  "source-dir",
  "download-qt-version",
  "download-qt-compiler",
  "download-qt-output-dir",
  "target",
  "qt-version",
  "compiler",
  "output-dir",
  "base-url",
  "set",
  "unset",
];

const COMMAND_SET: ReadonlySet<string> = new Set<string>(COMMANDS);

function isCommand(value: string): value is CommandName {
  return COMMAND_SET.has(value);
}

function optionalString(value: unknown): string | undefined {
  if (Array.isArray(value)) return optionalString(value[value.length - 1]);
  if (value === undefined || value === null || value === true || value === false) return undefined;
  const text = String(value);
  return text === "" ? undefined : text;
}

function stringList(value: unknown): string[] {
  if (value === undefined || value === null || typeof value === "boolean") return [];
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.map((item) => String(item)).filter(Boolean);
}

export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const separator = argv.indexOf("--");
  const own = separator === -1 ? argv : argv.slice(0, separator);
  const passthrough = separator === -1 ? [] : argv.slice(separator + 1);

  const mri = (await import("mri")).default;
  const args = mri(own, {
    alias: { h: "help", q: "quiet", t: "target", B: "build-dir", G: "generator" },
    boolean: BOOLEAN_FLAGS,
    string: STRING_FLAGS,
  });

  const positionals = args._.map(String);
  const first = positionals.shift() ?? "build";
  if (!isCommand(first)) {
    throw new CliUsageError(`Unknown command "${first}". Expected one of: ${COMMANDS.join(", ")}`);
  }

  return {
    command: first,
    positionals,
    passthrough,
    buildDir: optionalString(args["build-dir"]),
    buildType: optionalString(args["build-type"]),
    config: optionalString(args.config),
    qtPrefix: optionalString(args["qt-prefix"]),
    generator: optionalString(args.generator),
    sourceDir: optionalString(args["source-dir"]),
    downloadQtIfMissing: args["download-qt-if-missing"] === true,
    downloadQtVersion: optionalString(args["download-qt-version"]),
    downloadQtCompiler: optionalString(args["download-qt-compiler"]),
    downloadQtOutputDir: optionalString(args["download-qt-output-dir"]),
    targets: stringList(args.target),
    skipBuild: args["skip-build"] === true,
    fresh: args.fresh === true,
    qtVersion: optionalString(args["qt-version"]),
    compiler: optionalString(args.compiler),
    outputDir: optionalString(args["output-dir"]),
    baseUrl: optionalString(args["base-url"]),
    withTools: args["with-tools"] === true,
    set: stringList(args.set),
    unset: stringList(args.unset),
    print: args.print === true,
    quiet: args.quiet === true,
    help: args.help === true,
  };
}

export const HELP_TEXT = `
cmake-devkit — configure, build, test and run a CMake + Qt 6 project

Usage:
  cmake-devkit [build]                  Configure (if needed) and build
  cmake-devkit test [-- ctest args]     Build and run tests via ctest
  cmake-devkit run [target] [-- args]   Build and run an executable target
  cmake-devkit verify                   Check cmake, generator, compiler and Qt
  cmake-devkit check-updates            Compare the local Qt with the newest release
  cmake-devkit download-qt              Fetch Qt with the download helper
  cmake-devkit settings                 View or edit persisted defaults

Common options:
  --build-dir, -B <dir>        Build directory (default: settings or ./build)
  --build-type <type>          CMAKE_BUILD_TYPE (default: settings or Debug)
  --config <cfg>               --config value for multi-config generators
  --qt-prefix <dir>            Qt installation root
  --generator, -G <name>       CMake generator
  --source-dir <dir>           Project source root (default: current directory)
  --fresh                      Clear the build directory before configuring
  --download-qt-if-missing     Run the download helper when Qt is not found
  --download-qt-version <v>    Qt version for automatic downloads
  --download-qt-compiler <c>   Qt compiler/arch for automatic downloads (e.g. win64_mingw)
  --download-qt-output-dir <d> Where automatic downloads go (default: third_party/qt6)
  --quiet, -q                  Suppress informational messages
  --help, -h                   Show this help text

Command options:
  build:        --target, -t <name>   Target to build (repeatable)
  run:          --skip-build          Run without rebuilding first
  download-qt:  --qt-version <v>  --compiler <c>  --output-dir <d>  --base-url <url>  --with-tools
  settings:     --set KEY=VALUE (repeatable)  --unset KEY (repeatable)  --print

Environment variables:
  CMAKE_GENERATOR                    Generator override
  CXX, CC                            Compiler override
  QT_PREFIX_PATH, CMAKE_PREFIX_PATH  Qt prefix override
  CMAKE_DEVKIT_QT_DOWNLOADER         Download helper command (default: scripts/download-qt6)
`.trim();
