/**
 * In-memory model of a parsed source GPU assembly module: a register-based,
 * predicated ISA with several address spaces. The translator reads this model
 * and never mutates it.
 */

export const SOURCE_DATA_TYPES = [
  "s8",
  "s16",
  "s32",
  "s64",
  "u8",
  "u16",
  "u32",
  "u64",
  "b8",
  "b16",
  "b32",
  "b64",
  "f16",
  "f32",
  "f64",
  "pred",
] as const;
export type SourceDataType = (typeof SOURCE_DATA_TYPES)[number];

export const SOURCE_ADDRESS_SPACES = ["generic", "global", "shared", "local", "const", "param", "texture"] as const;
export type SourceAddressSpace = (typeof SOURCE_ADDRESS_SPACES)[number];

export const SOURCE_OPCODES = [
  "abs",
  "add",
  "and",
  "atom",
  "bar",
  "bra",
  "call",
  "cvt",
  "cvta",
  "div",
  "exit",
  "fma",
  "ld",
  "ldu",
  "mad",
  "max",
  "membar",
  "min",
  "mov",
  "mul",
  "neg",
  "not",
  "or",
  "rem",
  "ret",
  "selp",
  "setp",
  "shl",
  "shr",
  "slct",
  "st",
  "sub",
  "tex",
  "vote",
  "xor",
] as const;
export type SourceOpcode = (typeof SOURCE_OPCODES)[number];

export const SOURCE_MODIFIERS = ["rn", "rz", "rm", "rp", "rni", "rzi", "rmi", "rpi", "sat", "ftz", "approx", "full"] as const;
export type SourceModifier = (typeof SOURCE_MODIFIERS)[number];

export const SOURCE_COMPARISONS = [
  "eq",
  "ne",
  "lt",
  "le",
  "gt",
  "ge",
  "lo",
  "ls",
  "hi",
  "hs",
  "equ",
  "neu",
  "ltu",
  "leu",
  "gtu",
  "geu",
  "num",
  "nan",
] as const;
export type SourceComparison = (typeof SOURCE_COMPARISONS)[number];

export const SOURCE_ATOMIC_OPERATIONS = ["and", "or", "xor", "cas", "exch", "add", "inc", "dec", "min", "max"] as const;
export type SourceAtomicOperation = (typeof SOURCE_ATOMIC_OPERATIONS)[number];

export const SOURCE_MEMORY_LEVELS = ["cta", "gl", "sys"] as const;
export type SourceMemoryLevel = (typeof SOURCE_MEMORY_LEVELS)[number];

export const SOURCE_SPECIAL_REGISTERS = [
  "tid",
  "ntid",
  "laneid",
  "warpid",
  "nwarpid",
  "warpsize",
  "ctaid",
  "nctaid",
  "smid",
  "nsmid",
  "gridid",
  "clock",
  "clock64",
] as const;
export type SourceSpecialRegister = (typeof SOURCE_SPECIAL_REGISTERS)[number];

/** Special registers that are three-component vectors and are read one lane at a time. */
export const VECTOR_SPECIAL_REGISTERS: ReadonlySet<SourceSpecialRegister> = new Set<SourceSpecialRegister>([
  "tid",
  "ntid",
  "ctaid",
  "nctaid",
  "smid",
  "nsmid",
  "gridid",
]);

export const SOURCE_VECTOR_LANES = ["x", "y", "z", "w"] as const;
export type SourceVectorLane = (typeof SOURCE_VECTOR_LANES)[number];

export const SOURCE_ATTRIBUTES = ["extern", "visible", "weak", "none"] as const;
export type SourceAttribute = (typeof SOURCE_ATTRIBUTES)[number];

export type SourceRegisterId = number;

export type SourceOperand =
  | { readonly mode: "register"; readonly type: SourceDataType; readonly reg: SourceRegisterId }
  | { readonly mode: "indirect"; readonly type: SourceDataType; readonly reg: SourceRegisterId; readonly offset: number }
  | { readonly mode: "immediate"; readonly type: SourceDataType; readonly value: bigint }
  | { readonly mode: "address"; readonly identifier: string; readonly isArgument: boolean }
  | { readonly mode: "label"; readonly identifier: string }
  | {
      readonly mode: "special";
      readonly type: SourceDataType;
      readonly special: SourceSpecialRegister;
      readonly lane?: SourceVectorLane;
    }
  | { readonly mode: "bitBucket"; readonly type: SourceDataType }
  | { readonly mode: "functionName"; readonly identifier: string };

export type SourceAddressingMode = SourceOperand["mode"];

export type SourcePredicate =
  | { readonly condition: "pt" }
  | { readonly condition: "npt" }
  | { readonly condition: "pred"; readonly reg: SourceRegisterId }
  | { readonly condition: "invPred"; readonly reg: SourceRegisterId };

export type SourceInstruction = {
  readonly opcode: SourceOpcode;
  /** Instruction data type; selects signed, unsigned and float flavors. */
  readonly type?: SourceDataType;
  readonly addressSpace: SourceAddressSpace;
  readonly modifiers: readonly SourceModifier[];
  readonly comparison?: SourceComparison;
  readonly atomicOperation?: SourceAtomicOperation;
  readonly level?: SourceMemoryLevel;
  readonly uniform: boolean;
  readonly guard: SourcePredicate;
  readonly d?: SourceOperand;
  readonly a?: SourceOperand;
  readonly b?: SourceOperand;
  readonly c?: SourceOperand;
};

export type SourceBlock = {
  readonly label: string;
  readonly instructions: readonly SourceInstruction[];
};

export type SourceCfg = {
  readonly entry: SourceBlock;
  readonly exit: SourceBlock;
  /** Blocks in layout order, bracketed by the entry and exit sentinels. */
  executableSequence(): readonly SourceBlock[];
};

export type SourceParameter = {
  readonly name: string;
  readonly type: SourceDataType;
};

export type SourceRegister = {
  readonly id: SourceRegisterId;
  readonly type: SourceDataType;
};

export type SourceKernel = {
  readonly name: string;
  readonly linkingDirective: SourceAttribute;
  readonly parameters: readonly SourceParameter[];
  /** Every register the kernel references, in declaration order. */
  readonly registers: readonly SourceRegister[];
  readonly cfg: SourceCfg;
};

export type SourceGlobal = {
  readonly name: string;
  readonly type: SourceDataType;
  readonly attribute: SourceAttribute;
  readonly addressSpace: SourceAddressSpace;
  readonly initializer?: Uint8Array;
};

export type SourceModule = {
  readonly path: string;
  /** Keyed by name, in declaration order. */
  readonly globals: ReadonlyMap<string, SourceGlobal>;
  readonly kernels: readonly SourceKernel[];
};

export function createSourceCfg(blocks: readonly SourceBlock[]): SourceCfg {
  const entry: SourceBlock = Object.freeze({ label: "entry", instructions: [] });
  const exit: SourceBlock = Object.freeze({ label: "exit", instructions: [] });
  const sequence = Object.freeze([entry, ...blocks, exit]);
  return {
    entry,
    exit,
    executableSequence: () => sequence,
  };
}

export function isFloatType(type: SourceDataType): boolean {
  return type === "f16" || type === "f32" || type === "f64";
}

export function isSignedType(type: SourceDataType): boolean {
  return type.startsWith("s");
}

export function dataTypeBytes(type: SourceDataType): number {
  if (type === "pred") return 1;
  return Number(type.slice(1)) / 8;
}

/** Canonical target type name for a source data type. `f16` has no builtin target type. */
export function targetTypeName(type: SourceDataType): string {
  switch (type) {
    case "s8":
    case "u8":
    case "b8":
      return "i8";
    case "s16":
    case "u16":
    case "b16":
      return "i16";
    case "s32":
    case "u32":
    case "b32":
      return "i32";
    case "s64":
    case "u64":
    case "b64":
      return "i64";
    case "f16":
    case "f32":
    case "f64":
      return type;
    case "pred":
      return "i1";
  }
}

export function sourceOperandType(operand: SourceOperand): SourceDataType | undefined {
  return "type" in operand ? operand.type : undefined;
}

function sourceRegisterName(reg: SourceRegisterId): string {
  return `%r${reg}`;
}

export function sourceOperandToString(operand: SourceOperand): string {
  switch (operand.mode) {
    case "register":
      return sourceRegisterName(operand.reg);
    case "indirect": {
      if (operand.offset === 0) return `[${sourceRegisterName(operand.reg)}]`;
      const sign = operand.offset < 0 ? "-" : "+";
      return `[${sourceRegisterName(operand.reg)}${sign}${Math.abs(operand.offset)}]`;
    }
    case "immediate":
      return operand.value.toString();
    case "address":
    case "label":
    case "functionName":
      return operand.identifier;
    case "special":
      return operand.lane === undefined ? `%${operand.special}` : `%${operand.special}.${operand.lane}`;
    case "bitBucket":
      return "_";
  }
}

function sourcePredicateToString(guard: SourcePredicate): string {
  switch (guard.condition) {
    case "pt":
      return "";
    case "npt":
      return "@!pt ";
    case "pred":
      return `@${sourceRegisterName(guard.reg)} `;
    case "invPred":
      return `@!${sourceRegisterName(guard.reg)} `;
  }
}

/** One-line rendering for logs and diagnostics, e.g. `@%r3 add.s32 %r2, %r0, 1`. */
export function sourceInstructionToString(instruction: SourceInstruction): string {
  const suffixes: string[] = [];
  if (instruction.uniform) suffixes.push("uni");
  if (instruction.comparison) suffixes.push(instruction.comparison);
  if (instruction.level) suffixes.push(instruction.level);
  if (instruction.addressSpace !== "generic") suffixes.push(instruction.addressSpace);
  if (instruction.atomicOperation) suffixes.push(instruction.atomicOperation);
  suffixes.push(...instruction.modifiers);
  if (instruction.type) suffixes.push(instruction.type);

  const operands = [instruction.d, instruction.a, instruction.b, instruction.c]
    .filter((operand): operand is SourceOperand => operand !== undefined)
    .map(sourceOperandToString);
  const mnemonic = [instruction.opcode, ...suffixes].join(".");
  const tail = operands.length === 0 ? "" : ` ${operands.join(", ")}`;
  return `${sourcePredicateToString(instruction.guard)}${mnemonic}${tail}`;
}
