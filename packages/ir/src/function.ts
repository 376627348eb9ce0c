import { BasicBlock } from "./basic-block.js";
import { assertElementPosition, assertPosition } from "./contracts.js";
import type { Linkage, Module } from "./module.js";
import type { Type } from "./types.js";

export type VirtualRegister = {
  readonly id: number;
  readonly type: Type;
  readonly name?: string;
  readonly function: IrFunction;
};

export type Argument = {
  readonly name: string;
  readonly type: Type;
  readonly function: IrFunction;
};

export class IrFunction {
  readonly name: string;
  readonly linkage: Linkage;
  readonly module: Module;
  readonly entryBlock: BasicBlock;
  readonly exitBlock: BasicBlock;
  readonly #blocks: BasicBlock[] = [];
  readonly #arguments: Argument[] = [];
  readonly #registers = new Map<number, VirtualRegister>();
  #nextBlockId = 0;
  #nextRegisterId = 0;
  #nextInstructionId = 0;

  constructor(module: Module, name: string, linkage: Linkage) {
    this.module = module;
    this.name = name;
    this.linkage = linkage;
    this.entryBlock = new BasicBlock(this, this.#nextBlockId++, "entry");
    this.exitBlock = new BasicBlock(this, this.#nextBlockId++, "exit");
  }

  /** User-visible blocks in layout order; the synthetic entry and exit are not included. */
  get blocks(): readonly BasicBlock[] {
    return this.#blocks;
  }

  get arguments(): readonly Argument[] {
    return this.#arguments;
  }

  /** Registers in id order. */
  get registers(): readonly VirtualRegister[] {
    return [...this.#registers.values()];
  }

  assertMutable(): void {
    this.module.assertMutable();
  }

  newBasicBlock(position: number, name: string): BasicBlock {
    this.assertMutable();
    assertPosition(position, this.#blocks.length, "Basic block");
    const block = new BasicBlock(this, this.#nextBlockId++, name);
    this.#blocks.splice(position, 0, block);
    return block;
  }

  removeBasicBlock(position: number): number {
    this.assertMutable();
    assertElementPosition(position, this.#blocks.length, "Basic block");
    this.#blocks.splice(position, 1);
    return position;
  }

  getBasicBlock(name: string): BasicBlock | undefined {
    return this.#blocks.find((block) => block.name === name);
  }

  newArgument(type: Type, name: string, position: number = this.#arguments.length): Argument {
    this.assertMutable();
    assertPosition(position, this.#arguments.length, "Argument");
    const argument: Argument = { name, type, function: this };
    this.#arguments.splice(position, 0, argument);
    return argument;
  }

  getArgument(name: string): Argument | undefined {
    return this.#arguments.find((argument) => argument.name === name);
  }

  newVirtualRegister(type: Type, name?: string): VirtualRegister {
    this.assertMutable();
    const id = this.#nextRegisterId++;
    const register: VirtualRegister = name === undefined ? { id, type, function: this } : { id, type, name, function: this };
    this.#registers.set(id, register);
    return register;
  }

  getVirtualRegister(id: number): VirtualRegister | undefined {
    return this.#registers.get(id);
  }

  allocateInstructionId(): number {
    return this.#nextInstructionId++;
  }
}
