import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import {
  handleDoctor,
  formatDoctorReport,
  packageManagerBinaries,
  type DoctorDependencies,
  MIN_NODE_VERSION,
} from "../src/cli/handlers/doctorHandler.js";
import { ManifestSchema } from "../src/core/manifest/ManifestSchema.js";
import { cleanupTestDir, createTestDir, writeFiles } from "./helpers/fakes.js";

// =============================================================================
// Test Helpers
// =============================================================================

const MANIFEST = `name: desk
packageManager:
  install: dnf5 install -y
  query: rpm -q
steps:
  - kind: packages
    name: base
    packages: [git]
  - kind: packages
    name: debs
    packages: [stow]
    manager:
      install: apt-get install -y
`;

const ON_PATH: Record<string, string> = {
  git: "/usr/bin/git",
  make: "/usr/bin/make",
  dnf5: "/usr/bin/dnf5",
  "apt-get": "/usr/bin/apt-get",
  sudo: "/usr/bin/sudo",
};

function createDeps(testDir: string, overrides: Partial<DoctorDependencies> = {}): DoctorDependencies {
  return {
    env: { HOME: "/home/ana" },
    cwd: testDir,
    uid: 1000,
    getNodeVersion: () => "20.11.1",
    findExecutable: async (name) => ON_PATH[name] ?? null,
    ...overrides,
  };
}

// =============================================================================
// Tests
// =============================================================================

describe("handleDoctor", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir("rigforge-doctor-");
    await writeFiles(testDir, { "rigforge.yaml": MANIFEST });
  });

  afterEach(async () => {
    await cleanupTestDir(testDir);
  });

  it("passes every check on a ready machine", async () => {
    const result = await handleDoctor({ manifest: "rigforge.yaml" }, createDeps(testDir));

    expect(result.hasErrors).toBe(false);
    expect(result.checks).toEqual([
      { name: "Node.js", status: "OK", details: "v20.11.1" },
      { name: "git", status: "OK", details: "/usr/bin/git" },
      { name: "make", status: "OK", details: "/usr/bin/make" },
      { name: "HOME", status: "OK", details: "/home/ana" },
      { name: "Manifest", status: "OK", details: `${path.join(testDir, "rigforge.yaml")} (2 steps)` },
      { name: "Package manager", status: "OK", details: "/usr/bin/dnf5" },
      { name: "Package manager", status: "OK", details: "/usr/bin/apt-get" },
      { name: "Privilege command", status: "OK", details: "/usr/bin/sudo" },
    ]);
  });

  it("flags an old Node.js", async () => {
    const result = await handleDoctor(
      { manifest: "rigforge.yaml" },
      createDeps(testDir, { getNodeVersion: () => "18.19.0" }),
    );

    expect(result.hasErrors).toBe(true);
    expect(result.checks[0]).toEqual({
      name: "Node.js",
      status: "ERROR",
      details: `v18.19.0 (requires >= ${MIN_NODE_VERSION})`,
      fix: `Upgrade Node.js to >= ${MIN_NODE_VERSION}.`,
    });
  });

  it("keeps checking after a missing tool", async () => {
    const result = await handleDoctor(
      { manifest: "rigforge.yaml" },
      createDeps(testDir, { findExecutable: async (name) => (name === "make" ? null : ON_PATH[name] ?? null) }),
    );

    expect(result.hasErrors).toBe(true);
    expect(result.checks).toHaveLength(8);
    expect(result.checks[2]).toEqual({
      name: "make",
      status: "ERROR",
      details: "make not found on PATH",
      fix: "Install make with your package manager.",
    });
  });

  it("warns about a missing manifest and skips the package manager check", async () => {
    const result = await handleDoctor({ manifest: "absent.yaml" }, createDeps(testDir));

    expect(result.hasErrors).toBe(false);
    expect(result.checks.map((c) => `${c.status} ${c.name}`)).toEqual([
      "OK Node.js",
      "OK git",
      "OK make",
      "OK HOME",
      "WARN Manifest",
      "OK Privilege command",
    ]);
  });

  it("reports an invalid manifest as an error", async () => {
    await writeFiles(testDir, { "broken.yaml": "name: broken\nsteps: []\n" });

    const result = await handleDoctor({ manifest: "broken.yaml" }, createDeps(testDir));

    expect(result.hasErrors).toBe(true);
    expect(result.checks[4]).toMatchObject({ name: "Manifest", status: "ERROR", details: "Invalid manifest" });
  });

  it("needs no privilege command as root", async () => {
    const result = await handleDoctor({ manifest: "rigforge.yaml" }, createDeps(testDir, { uid: 0 }));

    expect(result.checks.at(-1)).toEqual({
      name: "Privilege command",
      status: "OK",
      details: "none (privileged commands run directly)",
    });
  });

  it("checks the --sudo override", async () => {
    const result = await handleDoctor({ manifest: "rigforge.yaml", sudo: "doas -n" }, createDeps(testDir));

    expect(result.checks.at(-1)).toEqual({
      name: "Privilege command",
      status: "ERROR",
      details: "doas not found on PATH",
      fix: "Install doas, run as root, or pick another with --sudo <cmd>.",
    });
  });

  it("reports a missing HOME", async () => {
    const result = await handleDoctor({ manifest: "absent.yaml" }, createDeps(testDir, { env: {} }));

    expect(result.checks[3]).toMatchObject({ name: "HOME", status: "ERROR", details: "not set" });
  });
});

describe("packageManagerBinaries", () => {
  it("lists each install command's binary once", () => {
    const manifest = {
      ...ManifestSchema.parse({
        name: "m",
        packageManager: { install: "dnf5 install -y" },
        steps: [
          { kind: "packages", name: "a", packages: ["git"] },
          { kind: "packages", name: "b", packages: ["make"], manager: { install: "dnf5 install --refresh" } },
        ],
      }),
      manifestPath: "/m.yaml",
    };

    expect(packageManagerBinaries(manifest)).toEqual(["dnf5"]);
  });
});

describe("formatDoctorReport", () => {
  it("prints one line per check with fixes below", () => {
    const lines = formatDoctorReport({
      hasErrors: true,
      checks: [
        { name: "Node.js", status: "OK", details: "v20.11.1" },
        { name: "Manifest", status: "WARN", details: "not found", fix: "Create rigforge.yaml\nor pass --manifest" },
      ],
    });

    expect(lines).toEqual([
      "rigforge doctor",
      "---------------",
      "[OK]    Node.js: v20.11.1",
      "[WARN]  Manifest: not found",
      "        Fix: Create rigforge.yaml",
      "             or pass --manifest",
    ]);
  });
});
