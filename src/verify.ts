// src/verify.ts — `verify` report: cmake, generator, compiler and Qt prefix checks

import { detectSdkFlavor, sdkLibraryDirs } from "./environment-probe.js";
import type { EnvironmentProbe } from "./environment-probe.js";
import { HELP_URLS, compilerInstallHint, packageInstallHint } from "./package-hints.js";
import type { Host } from "./types.js";

export interface VerifyReport {
  ok: boolean;
  lines: string[];
}

/**
 * Check what a configure + build needs. `ok` is false when cmake, a generator,
 * a compiler or Qt is missing, or when Qt and the toolchain disagree.
 */
export function verifyEnvironment(
  probe: EnvironmentProbe,
  host: Host,
  qtPrefix: string | undefined,
  generator: string | undefined,
): VerifyReport {
  const lines = ["Environment verification:"];
  let ok = true;

  const cmakePath = host.which("cmake");
  if (cmakePath) {
    lines.push(` - cmake: found at ${cmakePath}`);
  } else {
    ok = false;
    lines.push(` - cmake: MISSING. Try "${packageInstallHint(host, "cmake")}" or download ${HELP_URLS.cmake}.`);
  }

  const detectedGenerator = probe.resolveGenerator(generator);
  if (detectedGenerator) {
    lines.push(` - generator: ${detectedGenerator} (set via CLI/env/auto)`);
  } else {
    ok = false;
    lines.push(
      ` - generator: none detected. Install Ninja (${HELP_URLS.ninja}) ` +
        `e.g. "${packageInstallHint(host, "ninja")}" or set CMAKE_GENERATOR/--generator.`,
    );
  }

  const compiler = probe.describeCompiler(detectedGenerator);
  if (compiler.description) {
    lines.push(` - compiler: ${compiler.description}`);
    if (compiler.hint) lines.push(`   note: ${compiler.hint}`);
    if (compiler.libraryDirs.length > 0) {
      lines.push(` - compiler libs: ${compiler.libraryDirs.join(", ")}`);
    }
  } else {
    ok = false;
    lines.push(` - compiler: MISSING. ${compiler.hint ?? compilerInstallHint(host)}`);
  }

  const resolvedQt = probe.resolveSdkPrefix(qtPrefix, detectedGenerator);
  if (resolvedQt) {
    lines.push(` - Qt prefix: ${resolvedQt}`);
    const libs = sdkLibraryDirs(resolvedQt);
    if (libs.length > 0) {
      lines.push(` - Qt libs: ${libs.join(", ")}`);
    } else {
      ok = false;
      lines.push(" - Qt libs: not found under prefix (expected lib/lib64).");
    }

    const compilerFlavor = probe.resolveCompilerFlavor(detectedGenerator);
    const qtFlavor = detectSdkFlavor(resolvedQt);
    if (compilerFlavor && qtFlavor && compilerFlavor !== qtFlavor) {
      ok = false;
      lines.push(
        ` - Qt/toolchain mismatch: Qt looks like ${qtFlavor.toUpperCase()} but ` +
          `your compiler/generator looks like ${compilerFlavor.toUpperCase()}. ` +
          "Download a matching Qt build or switch toolchains.",
      );
    }
  } else {
    ok = false;
    lines.push(
      " - Qt prefix: not found. Set --qt-prefix / QT_PREFIX_PATH / CMAKE_PREFIX_PATH " +
        `or fetch Qt with "${HELP_URLS.downloadCommand}" ` +
        `(binaries: ${HELP_URLS.qt}; package manager e.g. "${packageInstallHint(host, "qt")}").`,
    );
  }

  return { ok, lines };
}
