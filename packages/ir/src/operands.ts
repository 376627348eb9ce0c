import type { BasicBlock } from "./basic-block.js";
import type { Argument, VirtualRegister } from "./function.js";
import type { Instruction } from "./instructions.js";
import type { Global } from "./module.js";
import type { Type } from "./types.js";

type OperandBase = {
  /** The instruction whose read or write slot holds this operand; unset until installed. */
  owner: Instruction | undefined;
};

export type RegisterOperand = OperandBase & {
  readonly kind: "register";
  readonly register: VirtualRegister;
};

export type IndirectOperand = OperandBase & {
  readonly kind: "indirect";
  readonly register: VirtualRegister;
  readonly offset: number;
};

export type ImmediateOperand = OperandBase & {
  readonly kind: "immediate";
  /** Raw 64-bit pattern; `type` says how to read it. */
  readonly value: bigint;
  readonly type: Type;
};

export type PredicateModifier = "alwaysTrue" | "alwaysFalse" | "straight" | "inverted";

export type PredicateOperand = OperandBase & {
  readonly kind: "predicate";
} & (
    | { readonly modifier: "alwaysTrue" | "alwaysFalse"; readonly register?: undefined }
    | { readonly modifier: "straight" | "inverted"; readonly register: VirtualRegister }
  );

export type AddressTarget =
  | { readonly kind: "global"; readonly global: Global }
  | { readonly kind: "basicBlock"; readonly block: BasicBlock };

export type AddressOperand = OperandBase & {
  readonly kind: "address";
  readonly target: AddressTarget;
};

export type ArgumentOperand = OperandBase & {
  readonly kind: "argument";
  readonly argument: Argument;
};

export type Operand =
  | RegisterOperand
  | IndirectOperand
  | ImmediateOperand
  | PredicateOperand
  | AddressOperand
  | ArgumentOperand;

export function registerOperand(register: VirtualRegister): RegisterOperand {
  return { kind: "register", register, owner: undefined };
}

export function indirectOperand(register: VirtualRegister, offset: number): IndirectOperand {
  if (!Number.isInteger(offset)) {
    throw new RangeError(`Indirect offset must be an integer, got ${offset}.`);
  }
  return { kind: "indirect", register, offset, owner: undefined };
}

const MIN_IMMEDIATE = -(1n << 63n);
const MAX_IMMEDIATE = (1n << 64n) - 1n;

/** `value` is 64 raw bits: anything in `[-2^63, 2^64)`; negatives are stored as two's complement. */
export function immediateOperand(value: bigint, type: Type): ImmediateOperand {
  if (value < MIN_IMMEDIATE || value > MAX_IMMEDIATE) {
    throw new RangeError(`Immediate ${value} does not fit in 64 bits.`);
  }
  return { kind: "immediate", value: BigInt.asUintN(64, value), type, owner: undefined };
}

export function alwaysTrue(): PredicateOperand {
  return { kind: "predicate", modifier: "alwaysTrue", owner: undefined };
}

export function alwaysFalse(): PredicateOperand {
  return { kind: "predicate", modifier: "alwaysFalse", owner: undefined };
}

export function predicateOperand(modifier: "straight" | "inverted", register: VirtualRegister): PredicateOperand {
  return { kind: "predicate", modifier, register, owner: undefined };
}

export function globalAddressOperand(global: Global): AddressOperand {
  return { kind: "address", target: { kind: "global", global }, owner: undefined };
}

export function basicBlockAddressOperand(block: BasicBlock): AddressOperand {
  return { kind: "address", target: { kind: "basicBlock", block }, owner: undefined };
}

export function argumentOperand(argument: Argument): ArgumentOperand {
  return { kind: "argument", argument, owner: undefined };
}

export function isAlwaysTrue(predicate: PredicateOperand): boolean {
  return predicate.modifier === "alwaysTrue";
}

export function isBasicBlockAddress(operand: Operand): operand is AddressOperand & {
  readonly target: { readonly kind: "basicBlock"; readonly block: BasicBlock };
} {
  return operand.kind === "address" && operand.target.kind === "basicBlock";
}

export function predicateEquals(a: PredicateOperand, b: PredicateOperand): boolean {
  return a.modifier === b.modifier && a.register === b.register;
}

/**
 * Copies an operand. Registers, globals, blocks and arguments are referenced,
 * not copied; the clone keeps the original's owner until a slot takes it.
 */
export function cloneOperand<T extends Operand>(operand: T): T {
  return { ...operand };
}

function registerName(register: VirtualRegister): string {
  return `%${register.name ?? register.id}`;
}

function immediateToString(value: bigint, type: Type): string {
  if (type.kind === "float") {
    const view = new DataView(new ArrayBuffer(8));
    if (type.bits === 32) {
      view.setUint32(0, Number(BigInt.asUintN(32, value)));
      return String(view.getFloat32(0));
    }
    view.setBigUint64(0, value);
    return String(view.getFloat64(0));
  }
  return BigInt.asUintN(type.bits, value).toString();
}

function predicateToString(predicate: PredicateOperand): string {
  switch (predicate.modifier) {
    case "alwaysTrue":
      return "@pt";
    case "alwaysFalse":
      return "@!pt";
    case "straight":
      return `@${registerName(predicate.register)}`;
    case "inverted":
      return `@!${registerName(predicate.register)}`;
  }
}

export function operandToString(operand: Operand): string {
  switch (operand.kind) {
    case "register":
      return registerName(operand.register);
    case "indirect": {
      if (operand.offset === 0) return `[${registerName(operand.register)}]`;
      const sign = operand.offset < 0 ? "-" : "+";
      return `[${registerName(operand.register)}${sign}${Math.abs(operand.offset)}]`;
    }
    case "immediate":
      return immediateToString(operand.value, operand.type);
    case "predicate":
      return predicateToString(operand);
    case "address":
      return operand.target.kind === "global" ? `@${operand.target.global.name}` : operand.target.block.name;
    case "argument":
      return `$${operand.argument.name}`;
  }
}
