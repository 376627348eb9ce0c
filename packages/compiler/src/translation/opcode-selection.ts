import type { BinaryOpcode, Comparison, ConversionOpcode } from "@vgpu/ir";

import {
  dataTypeBytes,
  isFloatType,
  isSignedType,
  type SourceComparison,
  type SourceDataType,
  type SourceInstruction,
  type SourceOpcode,
} from "../source/isa.js";

/** Opcodes that need a multi-instruction expansion, which is not implemented. */
export const COMPLEX_OPCODES: ReadonlySet<SourceOpcode> = new Set<SourceOpcode>([
  "call",
  "mad",
  "fma",
  "selp",
  "slct",
  "tex",
  "vote",
]);

export type SimpleBinaryOpcode = "add" | "and" | "div" | "mul" | "or" | "rem" | "shl" | "shr" | "sub" | "xor";

export type SimpleUnaryOpcode = "ld" | "ldu" | "mov" | "cvt" | "st";

export type ControlOpcode = "bra" | "ret" | "exit" | "bar" | "membar" | "setp" | "atom";

export function isComplexOpcode(opcode: SourceOpcode): boolean {
  return COMPLEX_OPCODES.has(opcode);
}

export function isSimpleBinaryOpcode(opcode: SourceOpcode): opcode is SimpleBinaryOpcode {
  switch (opcode) {
    case "add":
    case "and":
    case "div":
    case "mul":
    case "or":
    case "rem":
    case "shl":
    case "shr":
    case "sub":
    case "xor":
      return true;
    default:
      return false;
  }
}

/** `cvt` is simple only without rounding, saturation or other modifiers. */
export function isSimpleUnaryInstruction(
  instruction: SourceInstruction
): instruction is SourceInstruction & { readonly opcode: SimpleUnaryOpcode } {
  switch (instruction.opcode) {
    case "ld":
    case "ldu":
    case "mov":
    case "st":
      return true;
    case "cvt":
      return instruction.modifiers.length === 0;
    default:
      return false;
  }
}

export function isControlOpcode(opcode: SourceOpcode): opcode is ControlOpcode {
  switch (opcode) {
    case "bra":
    case "ret":
    case "exit":
    case "bar":
    case "membar":
    case "setp":
    case "atom":
      return true;
    default:
      return false;
  }
}

/**
 * Picks the conversion for `cvt` from the destination and source data types.
 * Widths compare in bytes.
 */
export function selectConversionOpcode(destination: SourceDataType, source: SourceDataType): ConversionOpcode {
  const destinationBytes = dataTypeBytes(destination);
  const sourceBytes = dataTypeBytes(source);

  if (isFloatType(destination)) {
    if (isFloatType(source)) {
      if (destinationBytes === sourceBytes) return "Bitcast";
      return destinationBytes < sourceBytes ? "Fptrunc" : "Fpext";
    }
    return isSignedType(source) ? "Sitofp" : "Uitofp";
  }

  if (isSignedType(destination)) {
    if (isFloatType(source)) return "Fptosi";
    if (sourceBytes > destinationBytes) return "Trunc";
    if (sourceBytes === destinationBytes) return "Bitcast";
    return isSignedType(source) ? "Sext" : "Zext";
  }

  if (isFloatType(source)) return "Fptoui";
  if (sourceBytes > destinationBytes) return "Trunc";
  if (sourceBytes === destinationBytes) return "Bitcast";
  return "Zext";
}

/** Float types select the float flavor where one exists; `div`, `rem` and `shr` also split on signedness. */
export function selectBinaryOpcode(opcode: SimpleBinaryOpcode, type: SourceDataType): BinaryOpcode {
  switch (opcode) {
    case "add":
      return "Add";
    case "and":
      return "And";
    case "or":
      return "Or";
    case "shl":
      return "Shl";
    case "sub":
      return "Sub";
    case "xor":
      return "Xor";
    case "mul":
      return isFloatType(type) ? "Fmul" : "Mul";
    case "div":
      if (isFloatType(type)) return "Fdiv";
      return isSignedType(type) ? "Sdiv" : "Udiv";
    case "rem":
      if (isFloatType(type)) return "Frem";
      return isSignedType(type) ? "Srem" : "Urem";
    case "shr":
      return isSignedType(type) ? "Ashr" : "Lshr";
  }
}

const COMPARISONS: Readonly<Record<SourceComparison, Comparison>> = Object.freeze({
  eq: "oeq",
  ne: "one",
  lt: "olt",
  le: "ole",
  gt: "ogt",
  ge: "oge",
  lo: "ult",
  ls: "ule",
  hi: "ugt",
  hs: "uge",
  equ: "ueq",
  neu: "une",
  ltu: "ult",
  leu: "ule",
  gtu: "ugt",
  geu: "uge",
  num: "num",
  nan: "nan",
});

/** Ordering of unsigned and bit-typed integers is unsigned, so `lt le gt ge` become `ult ule ugt uge`. */
const UNSIGNED_ORDERINGS: Readonly<Partial<Record<SourceComparison, Comparison>>> = Object.freeze({
  lt: "ult",
  le: "ule",
  gt: "ugt",
  ge: "uge",
});

export function selectComparison(comparison: SourceComparison, type: SourceDataType): Comparison {
  if (!isFloatType(type) && !isSignedType(type)) {
    return UNSIGNED_ORDERINGS[comparison] ?? COMPARISONS[comparison];
  }
  return COMPARISONS[comparison];
}
