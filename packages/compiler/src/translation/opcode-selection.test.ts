import { expect } from "chai";

import type { SourceDataType, SourceInstruction } from "../source/isa.js";
import {
  isComplexOpcode,
  isControlOpcode,
  isSimpleBinaryOpcode,
  isSimpleUnaryInstruction,
  selectBinaryOpcode,
  selectComparison,
  selectConversionOpcode,
} from "./opcode-selection.js";

describe("@vgpu/compiler opcode selection", () => {
  const types: readonly SourceDataType[] = ["s8", "s32", "s64", "u8", "u32", "u64", "f32", "f64"];

  // Rows are destinations, columns are sources, both in `types` order.
  const conversions: Readonly<Record<string, readonly string[]>> = {
    s8: ["Bitcast", "Trunc", "Trunc", "Bitcast", "Trunc", "Trunc", "Fptosi", "Fptosi"],
    s32: ["Sext", "Bitcast", "Trunc", "Zext", "Bitcast", "Trunc", "Fptosi", "Fptosi"],
    s64: ["Sext", "Sext", "Bitcast", "Zext", "Zext", "Bitcast", "Fptosi", "Fptosi"],
    u8: ["Bitcast", "Trunc", "Trunc", "Bitcast", "Trunc", "Trunc", "Fptoui", "Fptoui"],
    u32: ["Zext", "Bitcast", "Trunc", "Zext", "Bitcast", "Trunc", "Fptoui", "Fptoui"],
    u64: ["Zext", "Zext", "Bitcast", "Zext", "Zext", "Bitcast", "Fptoui", "Fptoui"],
    f32: ["Sitofp", "Sitofp", "Sitofp", "Uitofp", "Uitofp", "Uitofp", "Bitcast", "Fptrunc"],
    f64: ["Sitofp", "Sitofp", "Sitofp", "Uitofp", "Uitofp", "Uitofp", "Fpext", "Bitcast"],
  };

  it("selects conversions for every destination and source pair", () => {
    for (const destination of types) {
      const row = conversions[destination];
      expect(row, destination).to.not.equal(undefined);
      types.forEach((source, index) => {
        expect(selectConversionOpcode(destination, source), `${destination} <- ${source}`).to.equal(row?.[index]);
      });
    }
  });

  it("treats untyped bit types as unsigned and half floats by width", () => {
    expect(selectConversionOpcode("b16", "s8")).to.equal("Zext");
    expect(selectConversionOpcode("s16", "b32")).to.equal("Trunc");
    expect(selectConversionOpcode("f16", "f32")).to.equal("Fptrunc");
    expect(selectConversionOpcode("f32", "f16")).to.equal("Fpext");
    expect(selectConversionOpcode("f32", "b32")).to.equal("Uitofp");
  });

  it("selects binary flavors from the instruction type", () => {
    expect(selectBinaryOpcode("div", "s32")).to.equal("Sdiv");
    expect(selectBinaryOpcode("div", "u32")).to.equal("Udiv");
    expect(selectBinaryOpcode("div", "b32")).to.equal("Udiv");
    expect(selectBinaryOpcode("div", "f32")).to.equal("Fdiv");
    expect(selectBinaryOpcode("rem", "s64")).to.equal("Srem");
    expect(selectBinaryOpcode("rem", "u64")).to.equal("Urem");
    expect(selectBinaryOpcode("rem", "f64")).to.equal("Frem");
    expect(selectBinaryOpcode("mul", "f32")).to.equal("Fmul");
    expect(selectBinaryOpcode("mul", "s32")).to.equal("Mul");
    expect(selectBinaryOpcode("shr", "s32")).to.equal("Ashr");
    expect(selectBinaryOpcode("shr", "u32")).to.equal("Lshr");
    expect(selectBinaryOpcode("shr", "b32")).to.equal("Lshr");
    expect(selectBinaryOpcode("add", "f32")).to.equal("Add");
    expect(selectBinaryOpcode("xor", "b64")).to.equal("Xor");
  });

  it("maps source comparisons onto ordered and unordered comparisons", () => {
    const orderings = ["eq", "ne", "lt", "le", "gt", "ge", "lo", "ls", "hi", "hs"] as const;
    const signed = orderings.map((comparison) => selectComparison(comparison, "s32"));
    expect(signed).to.deep.equal(["oeq", "one", "olt", "ole", "ogt", "oge", "ult", "ule", "ugt", "uge"]);
    const float = orderings.map((comparison) => selectComparison(comparison, "f32"));
    expect(float).to.deep.equal(signed);
    const unordered = (["equ", "neu", "ltu", "leu", "gtu", "geu", "num", "nan"] as const).map((comparison) =>
      selectComparison(comparison, "f64")
    );
    expect(unordered).to.deep.equal(["ueq", "une", "ult", "ule", "ugt", "uge", "num", "nan"]);
  });

  it("orders unsigned and bit-typed integers as unsigned", () => {
    const orderings = ["eq", "ne", "lt", "le", "gt", "ge", "lo", "hs"] as const;
    const expected = ["oeq", "one", "ult", "ule", "ugt", "uge", "ult", "uge"];
    expect(orderings.map((comparison) => selectComparison(comparison, "u32"))).to.deep.equal(expected);
    expect(orderings.map((comparison) => selectComparison(comparison, "b64"))).to.deep.equal(expected);
    expect(selectComparison("lt", "s64")).to.equal("olt");
  });

  it("classifies source opcodes", () => {
    const cvt = (modifiers: SourceInstruction["modifiers"]): SourceInstruction => ({
      opcode: "cvt",
      addressSpace: "generic",
      modifiers,
      uniform: false,
      guard: { condition: "pt" },
    });
    expect((["call", "mad", "fma", "selp", "slct", "tex", "vote"] as const).every(isComplexOpcode)).to.equal(true);
    expect(isComplexOpcode("add")).to.equal(false);
    expect(isSimpleBinaryOpcode("shr")).to.equal(true);
    expect(isSimpleBinaryOpcode("not")).to.equal(false);
    expect(isSimpleUnaryInstruction(cvt([]))).to.equal(true);
    expect(isSimpleUnaryInstruction(cvt(["rn"]))).to.equal(false);
    expect(isControlOpcode("exit")).to.equal(true);
    expect(isControlOpcode("mov")).to.equal(false);
  });
});
