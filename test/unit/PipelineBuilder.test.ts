import { describe, it, expect } from "vitest";
import { PipelineBuilder } from "../../src/core/pipeline/PipelineBuilder.js";
import { ManifestSchema } from "../../src/core/manifest/ManifestSchema.js";
import type { ProvisionManifest } from "../../src/core/manifest/ManifestLoader.js";
import { RepoCloner } from "../../src/core/git/RepoCloner.js";
import { FakeGitClient, makeConfig, makeContext } from "../helpers/fakes.js";

function manifestOf(raw: unknown): ProvisionManifest {
  return { ...ManifestSchema.parse(raw), manifestPath: "/rig/src/rigforge.yaml" };
}

const config = makeConfig("/rig");

const MANIFEST = manifestOf({
  name: "desk",
  packageManager: { install: "dnf5 install -y" },
  steps: [
    {
      kind: "packages",
      name: "base",
      packages: ["git", "local/dzen2.rpm", "https://example.test/rpmfusion.rpm"],
      requires: [{ path: "local/dzen2.rpm", type: "file" }],
    },
    { kind: "clone", name: "sources", repos: [{ url: "https://example.test/spectrwm.git", dir: "spectrwm" }] },
    { kind: "build", name: "spectrwm", dir: "spectrwm/linux", commands: ["make"] },
    { kind: "copy", name: "fonts", from: "fonts", to: "/rig/home/.local/share/fonts", optional: true },
    { kind: "touch", name: "cargo-env", path: "/rig/home/.cargo/env" },
    { kind: "command", name: "starship", run: "sh install.sh", cwd: "starship" },
    { kind: "dotfiles", name: "dotfiles", source: "dotfiles" },
  ],
});

describe("PipelineBuilder", () => {
  const builder = new PipelineBuilder(config, { cloner: new RepoCloner(new FakeGitClient()) });

  it("builds one step per manifest step, in order", () => {
    const steps = builder.build(MANIFEST);

    expect(steps.map((s) => [s.kind, s.name, s.description, s.optional])).toEqual([
      ["packages", "base", "Install 3 packages", false],
      ["clone", "sources", "Clone spectrwm", false],
      ["build", "spectrwm", "Build in spectrwm/linux", false],
      ["copy", "fonts", "Copy fonts to /rig/home/.local/share/fonts", true],
      ["touch", "cargo-env", "Create /rig/home/.cargo/env", false],
      ["command", "starship", "sh install.sh", false],
      ["dotfiles", "dotfiles", "Deploy dotfiles from dotfiles", false],
    ]);
  });

  it("resolves relative paths against the source root", () => {
    const steps = builder.build(MANIFEST);

    expect(steps.map((s) => s.requires)).toEqual([
      [{ path: "/rig/src/local/dzen2.rpm", type: "file" }],
      [],
      [{ path: "/rig/src/spectrwm/linux", type: "directory" }],
      [{ path: "/rig/src/fonts", type: "directory" }],
      [],
      [{ path: "/rig/src/starship", type: "directory" }],
      [{ path: "/rig/src/dotfiles", type: "directory" }],
    ]);
  });

  it("resolves local package files but keeps names and URLs", async () => {
    const [packages] = builder.build(MANIFEST);
    if (!packages) throw new Error("expected a packages step");

    const actions = await packages.preview(makeContext(config));

    expect(actions).toEqual([
      {
        type: "run",
        description: String.raw`sudo sh -c 'dnf5 install -y '\''git'\'' '\''/rig/src/local/dzen2.rpm'\'' '\''https://example.test/rpmfusion.rpm'\'''`,
      },
    ]);
  });

  it("receives packages steps with the top-level manager filled in", () => {
    expect(MANIFEST.steps[0]).toMatchObject({ kind: "packages", manager: { install: "dnf5 install -y" } });
  });

  it("keeps only the requested kinds", () => {
    const steps = builder.build(MANIFEST, { kinds: ["dotfiles"] });

    expect(steps.map((s) => s.name)).toEqual(["dotfiles"]);
  });

  it("leaves absolute paths alone", () => {
    expect(builder.resolvePath("/abs/path")).toBe("/abs/path");
    expect(builder.resolvePath("dotfiles")).toBe("/rig/src/dotfiles");
  });
});
