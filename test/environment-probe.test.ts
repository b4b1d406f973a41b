import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import {
  EnvironmentProbe,
  VSWHERE_INSTALL_HELP,
  detectSdkFlavor,
  generatorForVisualStudioMajor,
  parseSearchDirs,
} from "../src/environment-probe.js";
import { ToolchainMismatchError } from "../src/types.js";
import { makeHost, makeTempDir, removeTempDir, writeTree } from "./helpers.js";
import type { FakeHostOptions } from "./helpers.js";

const VSWHERE_JSON_ARGS = "-latest -products * -requires Microsoft.Component.MSBuild -format json";
const VSWHERE_VERSION_ARGS = "-latest -products * -requires Microsoft.Component.MSBuild -property installationVersion";

let tmp: string;

beforeEach(() => {
  tmp = makeTempDir();
});

afterEach(() => removeTempDir(tmp));

function probeFor(options: FakeHostOptions, sdkRoot?: string) {
  const host = makeHost(options);
  return { host, probe: new EnvironmentProbe({ host, projectRoot: join(tmp, "project"), sdkRoot }) };
}

/** A Program Files (x86) tree with an installed vswhere.exe. */
function fakeVswhere(): { programFiles: string; vswhere: string } {
  const programFiles = join(tmp, "pf86");
  const vswhere = join(programFiles, "Microsoft Visual Studio", "Installer", "vswhere.exe");
  writeTree(tmp, { "pf86/Microsoft Visual Studio/Installer/vswhere.exe": "" });
  return { programFiles, vswhere };
}

// ─── Pure helpers ────────────────────────────────────────────────────────────

describe("detectSdkFlavor", () => {
  it("reads the flavor from path segments", () => {
    expect(detectSdkFlavor("C:\\Qt\\6.8.0\\mingw_64")).toBe("mingw");
    expect(detectSdkFlavor("/opt/qt/6.8.0/msvc2022_64")).toBe("msvc");
    expect(detectSdkFlavor("/opt/qt/6.8.0/gcc_64")).toBeUndefined();
  });
});

describe("generatorForVisualStudioMajor", () => {
  it("maps installer majors to generator names", () => {
    expect(generatorForVisualStudioMajor(17)).toBe("Visual Studio 17 2022");
    expect(generatorForVisualStudioMajor(18)).toBe("Visual Studio 17 2022");
    expect(generatorForVisualStudioMajor(16)).toBe("Visual Studio 16 2019");
    expect(generatorForVisualStudioMajor(15)).toBeUndefined();
  });
});

describe("parseSearchDirs", () => {
  it("splits the libraries line with the platform delimiter", () => {
    const output = "install: /usr/lib/gcc/x86_64/13/\nprograms: =/usr/bin\nlibraries: =/usr/lib:/lib\n";
    expect(parseSearchDirs(output, "linux")).toEqual(["/usr/lib", "/lib"]);
    expect(parseSearchDirs("libraries: =C:/mingw/lib;C:/mingw/x86_64/lib", "win32")).toEqual([
      "C:/mingw/lib",
      "C:/mingw/x86_64/lib",
    ]);
  });

  it("returns nothing without a libraries line", () => {
    expect(parseSearchDirs("programs: =/usr/bin", "linux")).toEqual([]);
  });
});

// ─── resolveGenerator ────────────────────────────────────────────────────────

describe("resolveGenerator", () => {
  it("prefers the CLI value over the environment", () => {
    const { probe } = probeFor({ env: { CMAKE_GENERATOR: "Unix Makefiles" }, tools: { ninja: "/usr/bin/ninja" } });
    expect(probe.resolveGenerator("Ninja Multi-Config")).toBe("Ninja Multi-Config");
    expect(probe.resolveGenerator()).toBe("Unix Makefiles");
  });

  it("picks Ninja when it is on PATH", () => {
    const { probe } = probeFor({ tools: { ninja: "/usr/bin/ninja" } });
    expect(probe.resolveGenerator()).toBe("Ninja");
  });

  it("leaves the choice to CMake when nothing is found", () => {
    const { probe } = probeFor({});
    expect(probe.resolveGenerator()).toBeUndefined();
  });

  it("detects Visual Studio through vswhere on Windows", () => {
    const { programFiles, vswhere } = fakeVswhere();
    const { probe } = probeFor({
      platform: "win32",
      env: { "ProgramFiles(x86)": programFiles },
      tools: { ninja: "C:/tools/ninja.exe" },
      outputs: {
        [`${vswhere} ${VSWHERE_JSON_ARGS}`]: JSON.stringify([
          { installationPath: "C:/VS/2022", installationVersion: "17.9.34607.119" },
        ]),
      },
    });
    expect(probe.resolveGenerator()).toBe("Visual Studio 17 2022");
  });

  it("falls back to Ninja when vswhere reports an old install", () => {
    const { programFiles, vswhere } = fakeVswhere();
    const { probe } = probeFor({
      platform: "win32",
      env: { "ProgramFiles(x86)": programFiles },
      tools: { ninja: "C:/tools/ninja.exe" },
      outputs: { [`${vswhere} ${VSWHERE_JSON_ARGS}`]: '[{"installationVersion":"15.9.0"}]' },
    });
    expect(probe.resolveGenerator()).toBe("Ninja");
  });

  it("tolerates malformed vswhere output", () => {
    const { programFiles, vswhere } = fakeVswhere();
    const { probe } = probeFor({
      platform: "win32",
      env: { "ProgramFiles(x86)": programFiles },
      outputs: { [`${vswhere} ${VSWHERE_JSON_ARGS}`]: "not json" },
    });
    expect(probe.resolveGenerator()).toBeUndefined();
    expect(probe.warnings.map((w) => w.message)).toEqual(["vswhere returned malformed JSON"]);
  });
});

// ─── vswhere hint ────────────────────────────────────────────────────────────

describe("missing vswhere hint", () => {
  it("is emitted once per probe", () => {
    const { probe } = probeFor({ platform: "win32" });
    expect(probe.vswhereHintShown).toBe(false);

    probe.resolveGenerator();
    probe.resolveGenerator();
    probe.hasVisualStudioInstall();

    expect(probe.vswhereHintShown).toBe(true);
    expect(probe.warnings).toEqual([{ level: "warn", module: "environment-probe", message: VSWHERE_INSTALL_HELP }]);
  });

  it("is tracked separately by each probe", () => {
    const first = probeFor({ platform: "win32" }).probe;
    first.resolveGenerator();
    const second = probeFor({ platform: "win32" }).probe;

    expect(first.vswhereHintShown).toBe(true);
    expect(second.vswhereHintShown).toBe(false);
  });

  it("is never emitted off Windows", () => {
    const { probe } = probeFor({ platform: "linux" });
    probe.resolveGenerator();
    probe.hasVisualStudioInstall();
    expect(probe.warnings).toEqual([]);
  });
});

// ─── resolveCompilerFlavor ───────────────────────────────────────────────────

describe("resolveCompilerFlavor", () => {
  it("is undefined off Windows", () => {
    const { probe } = probeFor({ tools: { "g++": "/usr/bin/g++" } });
    expect(probe.resolveCompilerFlavor("MinGW Makefiles")).toBeUndefined();
  });

  it("reads the generator name first", () => {
    const { probe } = probeFor({ platform: "win32", env: { CXX: "cl" } });
    expect(probe.resolveCompilerFlavor("MinGW Makefiles")).toBe("mingw");
    expect(probe.resolveCompilerFlavor("Visual Studio 17 2022")).toBe("msvc");
  });

  it("falls back to CXX and CC", () => {
    expect(probeFor({ platform: "win32", env: { CXX: "C:/mingw64/bin/g++.exe" } }).probe.resolveCompilerFlavor()).toBe(
      "mingw",
    );
    expect(probeFor({ platform: "win32", env: { CC: "cl.exe" } }).probe.resolveCompilerFlavor()).toBe("msvc");
  });

  it("treats a Developer Command Prompt as MSVC even with g++ on PATH", () => {
    const { probe } = probeFor({
      platform: "win32",
      env: { VCINSTALLDIR: "C:/VS/VC/" },
      tools: { "g++": "C:/Strawberry/c/bin/g++.exe" },
    });
    expect(probe.resolveCompilerFlavor()).toBe("msvc");
  });

  it("treats a vswhere-reported install as MSVC", () => {
    const { programFiles, vswhere } = fakeVswhere();
    const { probe } = probeFor({
      platform: "win32",
      env: { "ProgramFiles(x86)": programFiles },
      tools: { "g++": "C:/Strawberry/c/bin/g++.exe" },
      outputs: { [`${vswhere} ${VSWHERE_VERSION_ARGS}`]: "17.9.34607.119\n" },
    });
    expect(probe.resolveCompilerFlavor()).toBe("msvc");
  });

  it("uses g++ on PATH as a last resort", () => {
    const { probe } = probeFor({ platform: "win32", tools: { "g++": "C:/mingw64/bin/g++.exe" } });
    expect(probe.resolveCompilerFlavor()).toBe("mingw");
  });

  it("is undefined when nothing is found", () => {
    expect(probeFor({ platform: "win32" }).probe.resolveCompilerFlavor()).toBeUndefined();
  });
});

// ─── Qt prefix ───────────────────────────────────────────────────────────────

describe("resolveSdkPrefix", () => {
  it("prefers an existing CLI path", () => {
    writeTree(tmp, { "cli-qt/": "", "env-qt/": "" });
    const { probe } = probeFor({ env: { QT_PREFIX_PATH: join(tmp, "env-qt") } });
    expect(probe.resolveSdkPrefix(join(tmp, "cli-qt"))).toBe(join(tmp, "cli-qt"));
  });

  it("skips candidates that do not exist", () => {
    writeTree(tmp, { "env-qt/": "" });
    const { probe } = probeFor({ env: { QT_PREFIX_PATH: join(tmp, "env-qt") } });
    expect(probe.resolveSdkPrefix(join(tmp, "missing"))).toBe(join(tmp, "env-qt"));
  });

  it("uses the first CMAKE_PREFIX_PATH entry", () => {
    writeTree(tmp, { "first/": "", "second/": "" });
    const { probe } = probeFor({ env: { CMAKE_PREFIX_PATH: `${join(tmp, "first")}:${join(tmp, "second")}` } });
    expect(probe.resolveSdkPrefix()).toBe(join(tmp, "first"));
  });

  it("is undefined when nothing is configured or vendored", () => {
    const { probe } = probeFor({}, join(tmp, "no-sdk-root"));
    expect(probe.resolveSdkPrefix()).toBeUndefined();
  });
});

describe("vendored Qt autodetection", () => {
  let sdkRoot: string;

  beforeEach(() => {
    sdkRoot = join(tmp, "third_party", "qt6");
    writeTree(sdkRoot, {
      "6.5.3/mingw_64/lib/cmake/Qt6/": "",
      "6.7.2/mingw_64/lib/cmake/Qt6/": "",
      "6.8.0/msvc2022_64/lib/cmake/Qt6/": "",
      "6.9.0/msvc2022_64/lib/": "",
    });
  });

  it("lists every install with a Qt6 CMake package", () => {
    const { probe } = probeFor({}, sdkRoot);
    expect(probe.findSdkCandidates()).toEqual([
      { prefix: join(sdkRoot, "6.5.3", "mingw_64"), version: [6, 5, 3], flavor: "mingw" },
      { prefix: join(sdkRoot, "6.7.2", "mingw_64"), version: [6, 7, 2], flavor: "mingw" },
      { prefix: join(sdkRoot, "6.8.0", "msvc2022_64"), version: [6, 8, 0], flavor: "msvc" },
    ]);
  });

  it("prefers the highest version of the matching flavor", () => {
    const { probe } = probeFor({}, sdkRoot);
    expect(probe.autodetectSdkPrefix("mingw")).toBe(join(sdkRoot, "6.7.2", "mingw_64"));
    expect(probe.autodetectSdkPrefix("msvc")).toBe(join(sdkRoot, "6.8.0", "msvc2022_64"));
  });

  it("takes the highest version of any flavor without a preference", () => {
    const { probe } = probeFor({}, sdkRoot);
    expect(probe.autodetectSdkPrefix()).toBe(join(sdkRoot, "6.8.0", "msvc2022_64"));
  });

  it("resolves through the toolchain flavor on Windows", () => {
    const { probe } = probeFor({ platform: "win32" }, sdkRoot);
    expect(probe.resolveSdkPrefix(undefined, "MinGW Makefiles")).toBe(join(sdkRoot, "6.7.2", "mingw_64"));
  });

  it("defaults the SDK root to third_party/qt6 under the project", () => {
    const host = makeHost();
    const probe = new EnvironmentProbe({ host, projectRoot: tmp });
    expect(probe.sdkRoot).toBe(sdkRoot);
    expect(probe.resolveSdkPrefix()).toBe(join(sdkRoot, "6.8.0", "msvc2022_64"));
  });
});

// ─── enforceToolchainMatch ───────────────────────────────────────────────────

describe("enforceToolchainMatch", () => {
  it("throws when Qt and the toolchain disagree", () => {
    const { probe } = probeFor({ platform: "win32" });
    const prefix = "C:/Qt/6.8.0/msvc2022_64";

    expect(() => probe.enforceToolchainMatch(prefix, "MinGW Makefiles")).toThrow(ToolchainMismatchError);
    expect(() => probe.enforceToolchainMatch(prefix, "MinGW Makefiles")).toThrow(
      "Qt install C:/Qt/6.8.0/msvc2022_64 looks like MSVC, but your compiler/generator looks like MINGW.",
    );
  });

  it("accepts matching flavors", () => {
    const { probe } = probeFor({ platform: "win32" });
    expect(() => probe.enforceToolchainMatch("C:/Qt/6.8.0/mingw_64", "MinGW Makefiles")).not.toThrow();
  });

  it("does nothing without a prefix, an unknown flavor or off Windows", () => {
    const win = probeFor({ platform: "win32" }).probe;
    expect(() => win.enforceToolchainMatch(undefined, "MinGW Makefiles")).not.toThrow();
    expect(() => win.enforceToolchainMatch("C:/Qt/6.8.0/custom", "MinGW Makefiles")).not.toThrow();

    const linux = probeFor({ platform: "linux" }).probe;
    expect(() => linux.enforceToolchainMatch("/opt/Qt/6.8.0/msvc2022_64", "MinGW Makefiles")).not.toThrow();
  });
});

// ─── describeCompiler ────────────────────────────────────────────────────────

describe("describeCompiler", () => {
  it("finds a compiler on PATH and its library directories", () => {
    writeTree(tmp, { "toolchain/bin/g++": "", "toolchain/lib/": "" });
    const gxx = join(tmp, "toolchain", "bin", "g++");
    const { probe } = probeFor({ tools: { "g++": gxx } });

    expect(probe.describeCompiler()).toEqual({
      description: `g++ at ${gxx}`,
      libraryDirs: [join(tmp, "toolchain", "lib")],
    });
  });

  it("asks the compiler for its search directories", () => {
    writeTree(tmp, { "l1/": "" });
    const clang = join(tmp, "bin", "clang++");
    const { probe } = probeFor({
      tools: { "clang++": clang },
      outputs: { [`${clang} -print-search-dirs`]: `libraries: =${join(tmp, "l1")}:${join(tmp, "missing")}` },
    });

    expect(probe.describeCompiler()).toEqual({
      description: `clang++ at ${clang}`,
      libraryDirs: [join(tmp, "l1")],
    });
  });

  it("honors CXX", () => {
    const cxx = join(tmp, "bin", "g++-13");
    const { probe } = probeFor({ env: { CXX: "g++-13" }, tools: { "g++-13": cxx, "c++": "/usr/bin/c++" } });
    expect(probe.describeCompiler().description).toBe(`${cxx} (from $CXX)`);
  });

  it("reports a CXX that cannot be found", () => {
    const { probe } = probeFor({ env: { CXX: "nowhere-cxx" } });
    expect(probe.describeCompiler()).toEqual({
      hint: "$CXX points to nowhere-cxx, but it is not executable.",
      libraryDirs: [],
    });
  });

  it("suggests an install command when no compiler exists", () => {
    const { probe } = probeFor({ tools: { "apt-get": "/usr/bin/apt-get" } });
    expect(probe.describeCompiler()).toEqual({ hint: "sudo apt-get install build-essential", libraryDirs: [] });
  });

  it("describes a Visual Studio install without cl.exe on PATH", () => {
    const { programFiles, vswhere } = fakeVswhere();
    const vsRoot = join(tmp, "VS");
    writeTree(vsRoot, { "VC/Tools/MSVC/14.38.33130/lib/x64/": "" });
    const { probe } = probeFor({
      platform: "win32",
      env: { "ProgramFiles(x86)": programFiles },
      outputs: {
        [`${vswhere} ${VSWHERE_VERSION_ARGS}`]: "17.8.0",
        [`${vswhere} ${VSWHERE_JSON_ARGS}`]: JSON.stringify([{ installationPath: vsRoot, installationVersion: "17.8.0" }]),
      },
    });

    const report = probe.describeCompiler();
    expect(report.description).toBe("Visual Studio toolchain (via vswhere)");
    expect(report.hint).toBe(
      "cl.exe is not on PATH; use a Visual Studio generator or run from a " +
        "Developer Command Prompt for command-line builds.",
    );
    expect(report.libraryDirs).toContain(join(vsRoot, "VC", "Tools", "MSVC", "14.38.33130", "lib"));
    expect(report.libraryDirs).toContain(join(vsRoot, "VC", "Tools", "MSVC", "14.38.33130", "lib", "x64"));
  });

  it("prefers g++ for a MinGW generator on Windows", () => {
    const gxx = join(tmp, "mingw64", "bin", "g++.exe");
    const { probe } = probeFor({ platform: "win32", tools: { "g++": gxx, cl: "C:/VS/cl.exe" } });
    expect(probe.describeCompiler("MinGW Makefiles").description).toBe(`MinGW-w64 g++ at ${gxx}`);
  });

  it("points at both Windows toolchains when neither is present", () => {
    const { probe } = probeFor({ platform: "win32" });
    expect(probe.describeCompiler()).toEqual({
      hint: "Install MSVC Build Tools or MinGW-w64 and ensure cl.exe/g++.exe is available.",
      libraryDirs: [],
    });
  });
});

describe("resolveEnvironment", () => {
  it("bundles generator, compiler and Qt prefix", () => {
    writeTree(tmp, { "qt/": "" });
    const { probe } = probeFor({ tools: { ninja: "/usr/bin/ninja" } });

    expect(probe.resolveEnvironment(undefined, join(tmp, "qt"))).toEqual({
      generator: "Ninja",
      compiler: { hint: "Install a C++ compiler (clang++/g++) and ensure it is on PATH.", libraryDirs: [] },
      qtPrefix: join(tmp, "qt"),
    });
  });
});
