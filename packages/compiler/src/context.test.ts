import { integerType } from "@vgpu/ir";
import { expect } from "chai";

import { CompilationContext } from "./context.js";

describe("@vgpu/compiler compilation context", () => {
  it("resolves builtin and extra types by name", () => {
    const context = new CompilationContext([integerType(32, "word")]);
    expect(context.getType("i64")).to.deep.equal({ kind: "integer", name: "i64", bits: 64 });
    expect(context.getType("word")).to.deep.equal({ kind: "integer", name: "word", bits: 32 });
    expect(context.getType("f16")).to.equal(undefined);
  });

  it("rejects an extra type that shadows a builtin", () => {
    expect(() => new CompilationContext([integerType(32)])).to.throw("Type 'i32' is registered twice.");
  });

  it("tracks the modules it creates", () => {
    const context = new CompilationContext();
    const first = context.newModule("a.ptx");
    context.newModule("b.ptx");
    expect(context.modules.map((module) => module.name)).to.deep.equal(["a.ptx", "b.ptx"]);
    expect(context.getModule("a.ptx")).to.equal(first);
    expect(context.getModule("c.ptx")).to.equal(undefined);
  });
});
