// src/package-hints.ts — Install suggestions for missing tools
// Maps the host's package manager to a concrete install command.

import type { Host } from "./types.js";

export type PackageManager = "apt" | "dnf" | "brew" | "choco";

export type InstallableTool = "ninja" | "cmake" | "qt";

export const HELP_URLS = {
  cmake: "https://cmake.org/download/",
  ninja: "https://ninja-build.org/",
  qt: "https://www.qt.io/download",
  downloadCommand: "cmake-devkit download-qt",
} as const;

const PACKAGE_NAMES: Record<InstallableTool, Record<PackageManager, string>> = {
  ninja: { apt: "ninja-build", dnf: "ninja-build", brew: "ninja", choco: "ninja" },
  cmake: { apt: "cmake", dnf: "cmake", brew: "cmake", choco: "cmake" },
  qt: {
    apt: "qt6-base-dev qt6-declarative-dev",
    dnf: "qt6-qtbase-devel qt6-qtdeclarative-devel",
    brew: "qt@6",
    choco: "qt-lts-long-term-release",
  },
};

export function detectPackageManager(host: Host): PackageManager | undefined {
  if (host.platform === "win32") return "choco";
  if (host.platform === "darwin") return "brew";
  if (host.which("apt-get")) return "apt";
  // yum-based distros take the same package names as dnf
  if (host.which("dnf") || host.which("yum")) return "dnf";
  return undefined;
}

function installCommand(manager: PackageManager, pkg: string): string {
  switch (manager) {
    case "apt":
      return `sudo apt-get install ${pkg}`;
    case "dnf":
      return `sudo dnf install ${pkg}`;
    case "brew":
      return `brew install ${pkg}`;
    case "choco":
      return `choco install ${pkg} -y`;
  }
}

export function packageInstallHint(host: Host, tool: InstallableTool): string {
  const manager = detectPackageManager(host);
  if (manager) return installCommand(manager, PACKAGE_NAMES[tool][manager]);
  return `Install via your package manager (${Object.keys(PACKAGE_NAMES[tool]).join(" / ")})`;
}

export function compilerInstallHint(host: Host): string {
  if (host.platform === "darwin") {
    return "Install the Xcode Command Line Tools: xcode-select --install";
  }
  switch (detectPackageManager(host)) {
    case "apt":
      return "sudo apt-get install build-essential";
    case "dnf":
      return "sudo dnf install gcc-c++";
    case "brew":
      return "brew install llvm";
    case "choco":
      return "Install Visual Studio Build Tools 2022 (Desktop C++ workload) or MinGW-w64.";
    default:
      return "Install a C++ compiler (clang++/g++) and ensure it is on PATH.";
  }
}
