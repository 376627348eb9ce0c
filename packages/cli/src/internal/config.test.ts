import { expect } from "chai";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { findProjectContext, findProjectRoot, loadProjectConfig, parseProjectConfig } from "./config.js";

describe("@vgpu/cli config", () => {
  it("findProjectRoot picks the nearest project root", () => {
    const root = mkdtempSync(join(tmpdir(), "vgpu-config-project-"));
    const nestedProjectRoot = join(root, "kernels", "demo");
    const deep = join(nestedProjectRoot, "src", "docs");
    mkdirSync(deep, { recursive: true });
    writeFileSync(join(root, "vgpu.json"), "{}\n", "utf-8");
    writeFileSync(join(nestedProjectRoot, "vgpu.json"), "{}\n", "utf-8");

    expect(findProjectRoot(deep)).to.equal(nestedProjectRoot);
    expect(findProjectRoot(root)).to.equal(root);
  });

  it("loads a strict project config with defaults", () => {
    const root = mkdtempSync(join(tmpdir(), "vgpu-config-load-"));
    const path = join(root, "vgpu.json");
    writeFileSync(path, JSON.stringify({ schema: 1, input: "scale.json" }) + "\n", "utf-8");

    expect(loadProjectConfig(path)).to.deep.equal({ schema: 1, input: "scale.json", verbose: false, types: [] });
    expect(findProjectContext(root)).to.deep.equal({
      projectRoot: root,
      project: { schema: 1, input: "scale.json", verbose: false, types: [] },
    });
  });

  it("finds no project context outside a project", () => {
    const root = mkdtempSync(join(tmpdir(), "vgpu-config-none-"));
    expect(findProjectContext(root)).to.equal(undefined);
  });

  it("builds extra target types", () => {
    const config = parseProjectConfig({
      schema: 1,
      input: "k.json",
      verbose: true,
      types: [
        { name: "f16", kind: "integer", bits: 16 },
        { name: "real", kind: "float", bits: 64 },
      ],
    });
    expect(config.verbose).to.equal(true);
    expect(config.types).to.deep.equal([
      { kind: "integer", name: "f16", bits: 16 },
      { kind: "float", name: "real", bits: 64 },
    ]);
  });

  it("rejects unknown keys, schemas and widths", () => {
    expect(() => parseProjectConfig({ schema: 1, input: "k.json", extra: true })).to.throw("vgpu.json: unknown key 'extra'.");
    expect(() => parseProjectConfig({ schema: 2, input: "k.json" })).to.throw("Unsupported vgpu.json schema.");
    expect(() => parseProjectConfig({ schema: 1 })).to.throw("vgpu.json: 'input' must be a non-empty string.");
    expect(() =>
      parseProjectConfig({ schema: 1, input: "k.json", types: [{ name: "half", kind: "float", bits: 16 }] })
    ).to.throw("vgpu.json: 'types[0].bits' must be one of 32, 64.");
    expect(() =>
      parseProjectConfig({ schema: 1, input: "k.json", types: [{ name: "x", kind: "vector", bits: 32 }] })
    ).to.throw("vgpu.json: 'types[0].kind' must be one of: 'integer', 'float'.");
  });
});
