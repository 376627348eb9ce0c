import { TranslationError } from "@vgpu/compiler";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { parseTranslateArgs, runTranslate } from "./translate.js";

describe("@vgpu/cli translate", () => {
  const copyModule = {
    path: "copy.ptx",
    kernels: [
      {
        name: "copy",
        registers: [{ id: 0, type: "s32" }],
        blocks: [
          {
            label: "L",
            instructions: [
              {
                opcode: "mov",
                type: "s32",
                d: { mode: "register", type: "s32", reg: 0 },
                a: { mode: "immediate", type: "s32", value: 5 },
              },
              { opcode: "ret" },
            ],
          },
        ],
      },
    ],
  };

  const halfModule = {
    path: "half.ptx",
    kernels: [{ name: "half", linkingDirective: "extern", registers: [{ id: 0, type: "f16" }], blocks: [] }],
  };

  function writeJson(path: string, value: unknown): void {
    writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
  }

  function capture(): { readonly lines: string[]; readonly sink: (line: string) => void } {
    const lines: string[] = [];
    return { lines, sink: (line) => lines.push(line) };
  }

  it("parses flags and resolves the input against the working directory", () => {
    expect(parseTranslateArgs({ dir: "/work", argv: [] })).to.deep.equal({ verbose: false });
    expect(parseTranslateArgs({ dir: "/work", argv: ["-v", "k/copy.json"] })).to.deep.equal({
      file: "/work/k/copy.json",
      verbose: true,
    });
    expect(() => parseTranslateArgs({ dir: "/work", argv: ["--fast"] })).to.throw("translate: unknown arg: --fast");
    expect(() => parseTranslateArgs({ dir: "/work", argv: ["a.json", "b.json"] })).to.throw(
      "translate: unexpected extra input: b.json"
    );
  });

  it("translates the project input and prints one summary per function", () => {
    const root = mkdtempSync(join(tmpdir(), "vgpu-translate-project-"));
    const nested = join(root, "src");
    mkdirSync(nested);
    writeJson(join(root, "vgpu.json"), { schema: 1, input: "copy.json" });
    writeJson(join(root, "copy.json"), copyModule);

    const out = capture();
    const err = capture();
    const module = runTranslate({ dir: nested, argv: [], out: out.sink, err: err.sink });
    expect(module.name).to.equal("copy.ptx");
    expect(out.lines).to.deep.equal(["copy (private): 1 blocks, 1 registers, 2 instructions"]);
    expect(err.lines).to.deep.equal([]);
  });

  it("writes the indented translation log when verbose", () => {
    const root = mkdtempSync(join(tmpdir(), "vgpu-translate-verbose-"));
    writeJson(join(root, "copy.json"), copyModule);

    const out = capture();
    const err = capture();
    runTranslate({ dir: root, argv: ["--verbose", "copy.json"], out: out.sink, err: err.sink });
    expect(err.lines).to.deep.equal([
      "Translating module 'copy.ptx'",
      " Translating kernel 'copy' (none)",
      "  Translating register .s32 r0",
      "   to i32 %r0 (id 0)",
      "  Creating basic block L",
      "  Translating basic block L",
      "   Translating instruction mov.s32 %r0, 5",
      "    to Bitcast %r0, 5",
      "   Translating instruction ret",
      "    to Ret",
    ]);
  });

  it("extends the type registry from the project config", () => {
    const root = mkdtempSync(join(tmpdir(), "vgpu-translate-types-"));
    writeJson(join(root, "half.json"), halfModule);
    expect(() => runTranslate({ dir: root, argv: ["half.json"], out: () => undefined })).to.throw(
      TranslationError,
      "Translated type name 'f16' is not a valid target type."
    );

    writeJson(join(root, "vgpu.json"), {
      schema: 1,
      input: "unused.json",
      types: [{ name: "f16", kind: "integer", bits: 16 }],
    });
    const out = capture();
    runTranslate({ dir: root, argv: ["half.json"], out: out.sink });
    expect(out.lines).to.deep.equal(["half (external): 0 blocks, 1 registers, 0 instructions"]);
  });

  it("requires an input when there is no project config", () => {
    const root = mkdtempSync(join(tmpdir(), "vgpu-translate-none-"));
    expect(() => runTranslate({ dir: root, argv: [] })).to.throw(
      "translate: no input file given and no vgpu.json found."
    );
  });
});
