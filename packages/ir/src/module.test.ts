import { expect } from "chai";

import { createInstruction } from "./instructions.js";
import { Module } from "./module.js";
import { integerType } from "./types.js";

describe("@vgpu/ir containers", () => {
  const i8 = integerType(8);
  const i32 = integerType(32);

  it("positions functions and looks them up by name", () => {
    const module = new Module("m");
    module.newFunction("a", "external");
    module.newFunction("b", "private", 0);
    expect(module.functions.map((fn) => fn.name)).to.deep.equal(["b", "a"]);
    expect(module.getFunction("a")?.linkage).to.equal("external");
    expect(module.getFunction("missing")).to.equal(undefined);

    expect(module.removeFunction(0)).to.equal(0);
    expect(module.functions.map((fn) => fn.name)).to.deep.equal(["a"]);
    expect(() => module.removeFunction(5)).to.throw(RangeError);
    expect(() => module.newFunction("c", "external", 3)).to.throw(RangeError);
  });

  it("gives every function synthetic entry and exit blocks", () => {
    const fn = new Module("m").newFunction("k", "external");
    expect(fn.blocks).to.have.length(0);
    expect(fn.entryBlock.isEntry).to.equal(true);
    expect(fn.exitBlock.isExit).to.equal(true);
    expect([fn.entryBlock.name, fn.exitBlock.name]).to.deep.equal(["entry", "exit"]);
    const block = fn.newBasicBlock(0, "BB_1");
    expect(block.id).to.equal(2);
    expect(fn.getBasicBlock("BB_1")).to.equal(block);
    expect(fn.getBasicBlock("entry")).to.equal(undefined);
    expect(fn.removeBasicBlock(0)).to.equal(0);
    expect(fn.blocks).to.have.length(0);
  });

  it("numbers registers and keeps arguments ordered", () => {
    const fn = new Module("m").newFunction("k", "external");
    const first = fn.newVirtualRegister(i32, "r0");
    const second = fn.newVirtualRegister(i32);
    expect([first.id, second.id]).to.deep.equal([0, 1]);
    expect(fn.getVirtualRegister(1)).to.equal(second);
    expect(fn.getVirtualRegister(9)).to.equal(undefined);
    expect(fn.registers).to.deep.equal([first, second]);

    fn.newArgument(i32, "n");
    fn.newArgument(i8, "flag", 0);
    expect(fn.arguments.map((argument) => argument.name)).to.deep.equal(["flag", "n"]);
    expect(fn.getArgument("n")?.type).to.equal(i32);
  });

  it("inserts and removes instructions by position", () => {
    const fn = new Module("m").newFunction("k", "external");
    const block = fn.newBasicBlock(0, "BB_1");
    const other = fn.newBasicBlock(1, "BB_2");
    const ret = createInstruction(block, { shape: "return" });
    const bar = createInstruction(block, { shape: "barrier" });

    expect(block.push(ret)).to.equal(0);
    expect(block.insert(0, bar)).to.equal(0);
    expect(block.instructions).to.deep.equal([bar, ret]);
    expect(block.indexOf(ret)).to.equal(1);
    expect(() => block.push(ret)).to.throw("Instruction 0 is already in block 'BB_1'.");
    expect(() => other.push(createInstruction(block, { shape: "launch" }))).to.throw(/belongs to block 'BB_1'/);
    expect(() => block.insert(5, createInstruction(block, { shape: "launch" }))).to.throw(RangeError);

    expect(block.remove(0)).to.equal(0);
    expect(block.size).to.equal(1);
    expect(() => block.remove(1)).to.throw(RangeError);
  });

  it("attaches byte constants to globals of the same module", () => {
    const module = new Module("m");
    const global = module.newGlobal("table", i8, "private");
    const bytes = Uint8Array.of(1, 2, 3);
    const constant = module.newConstant(bytes);
    bytes[0] = 9;
    global.setInitializer(constant);
    expect(Array.from(global.initializer?.bytes ?? new Uint8Array())).to.deep.equal([1, 2, 3]);
    expect(module.getGlobal("table")).to.equal(global);
    expect(module.getGlobal("missing")).to.equal(undefined);

    const foreign = new Module("other").newConstant(Uint8Array.of(0));
    expect(() => global.setInitializer(foreign)).to.throw(
      "Initializer of global 'table' must be a constant of module 'm'."
    );
    expect(module.removeGlobal(0)).to.equal(0);
    expect(module.globals).to.have.length(0);
  });

  it("rejects structural mutation after freeze", () => {
    const module = new Module("m");
    const fn = module.newFunction("k", "external");
    module.freeze();
    expect(module.isFrozen).to.equal(true);
    expect(() => module.newFunction("late", "external")).to.throw("Module 'm' is frozen.");
    expect(() => fn.newBasicBlock(0, "BB_1")).to.throw("Module 'm' is frozen.");
    expect(() => fn.newVirtualRegister(i32)).to.throw("Module 'm' is frozen.");
    expect(module.getFunction("k")).to.equal(fn);
  });
});
