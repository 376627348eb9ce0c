import { assertElementPosition, assertPosition } from "./contracts.js";
import type { IrFunction } from "./function.js";
import type { Instruction } from "./instructions.js";

export class BasicBlock {
  readonly id: number;
  readonly name: string;
  readonly function: IrFunction;
  readonly #instructions: Instruction[] = [];

  constructor(fn: IrFunction, id: number, name: string) {
    this.function = fn;
    this.id = id;
    this.name = name;
  }

  get instructions(): readonly Instruction[] {
    return this.#instructions;
  }

  get size(): number {
    return this.#instructions.length;
  }

  get isEntry(): boolean {
    return this === this.function.entryBlock;
  }

  get isExit(): boolean {
    return this === this.function.exitBlock;
  }

  /** Inserts before `position` (`size` appends) and returns the position of the new instruction. */
  insert(position: number, instruction: Instruction): number {
    this.function.assertMutable();
    assertPosition(position, this.#instructions.length, "Instruction");
    if (instruction.block !== this) {
      throw new Error(`Instruction ${instruction.id} belongs to block '${instruction.block.name}', not '${this.name}'.`);
    }
    if (this.#instructions.includes(instruction)) {
      throw new Error(`Instruction ${instruction.id} is already in block '${this.name}'.`);
    }
    this.#instructions.splice(position, 0, instruction);
    return position;
  }

  push(instruction: Instruction): number {
    return this.insert(this.#instructions.length, instruction);
  }

  /** Returns the position of the instruction that followed the removed one. */
  remove(position: number): number {
    this.function.assertMutable();
    assertElementPosition(position, this.#instructions.length, "Instruction");
    this.#instructions.splice(position, 1);
    return position;
  }

  indexOf(instruction: Instruction): number {
    return this.#instructions.indexOf(instruction);
  }
}
