import type { BasicBlock } from "./basic-block.js";
import { assertNever } from "./contracts.js";
import {
  alwaysTrue,
  cloneOperand,
  isAlwaysTrue,
  isBasicBlockAddress,
  operandToString,
  predicateEquals,
  type Operand,
  type PredicateOperand,
  type RegisterOperand,
} from "./operands.js";

export type UnaryOpcode =
  | "Bitcast"
  | "Sext"
  | "Zext"
  | "Trunc"
  | "Sitofp"
  | "Uitofp"
  | "Fptosi"
  | "Fptoui"
  | "Fpext"
  | "Fptrunc"
  | "Ld";

export type BinaryOpcode =
  | "Add"
  | "Sub"
  | "Mul"
  | "Fmul"
  | "And"
  | "Or"
  | "Xor"
  | "Shl"
  | "Ashr"
  | "Lshr"
  | "Sdiv"
  | "Udiv"
  | "Fdiv"
  | "Srem"
  | "Urem"
  | "Frem";

export type ConversionOpcode = Exclude<UnaryOpcode, "Ld">;

export type Opcode =
  | UnaryOpcode
  | BinaryOpcode
  | "Setp"
  | "Atom"
  | "St"
  | "Bra"
  | "Call"
  | "Ret"
  | "Bar"
  | "Membar"
  | "Launch"
  | "Phi"
  | "Psi";

export type Comparison =
  | "oeq"
  | "one"
  | "olt"
  | "ole"
  | "ogt"
  | "oge"
  | "ueq"
  | "une"
  | "ult"
  | "ule"
  | "ugt"
  | "uge"
  | "num"
  | "nan";

export type AtomicOperation = "add" | "exch" | "cas" | "and" | "or" | "xor" | "inc" | "dec" | "min" | "max";

export type MemoryLevel = "cta" | "gl" | "sys";

export type BranchModifier = "none" | "uniform";

type InstructionBase = {
  /** Unique within the owning function. */
  readonly id: number;
  readonly block: BasicBlock;
  guard: PredicateOperand;
};

export type UnaryInstruction = InstructionBase & {
  readonly shape: "unary";
  readonly opcode: UnaryOpcode;
  d: Operand;
  a: Operand;
};

export type BinaryInstruction = InstructionBase & {
  readonly shape: "binary";
  readonly opcode: BinaryOpcode;
  d: Operand;
  a: Operand;
  b: Operand;
};

export type ComparisonInstruction = InstructionBase & {
  readonly shape: "comparison";
  readonly opcode: "Setp";
  readonly comparison: Comparison;
  d: Operand;
  a: Operand;
  b: Operand;
};

export type AtomicInstruction = InstructionBase & {
  readonly shape: "atomic";
  readonly opcode: "Atom";
  readonly operation: AtomicOperation;
  d: Operand;
  a: Operand;
  b: Operand;
  /** Compare value of compare-and-swap style operations. */
  c: Operand | undefined;
};

export type StoreInstruction = InstructionBase & {
  readonly shape: "store";
  readonly opcode: "St";
  /** Memory written. */
  d: Operand;
  /** Value stored. */
  a: Operand;
};

export type BranchInstruction = InstructionBase & {
  readonly shape: "branch";
  readonly opcode: "Bra";
  readonly modifier: BranchModifier;
  target: Operand | undefined;
};

export type CallInstruction = InstructionBase & {
  readonly shape: "call";
  readonly opcode: "Call";
  target: Operand | undefined;
  readonly returned: Operand[];
  readonly arguments: Operand[];
};

export type ReturnInstruction = InstructionBase & { readonly shape: "return"; readonly opcode: "Ret" };

export type BarrierInstruction = InstructionBase & { readonly shape: "barrier"; readonly opcode: "Bar" };

export type FenceInstruction = InstructionBase & {
  readonly shape: "fence";
  readonly opcode: "Membar";
  readonly level: MemoryLevel;
};

export type LaunchInstruction = InstructionBase & { readonly shape: "launch"; readonly opcode: "Launch" };

export type PhiEdge = {
  readonly predecessor: BasicBlock;
  readonly value: RegisterOperand;
};

export type PhiInstruction = InstructionBase & {
  readonly shape: "phi";
  readonly opcode: "Phi";
  d: RegisterOperand;
  readonly edges: PhiEdge[];
};

export type PsiEdge = {
  readonly predicate: PredicateOperand;
  readonly value: RegisterOperand;
};

export type PsiInstruction = InstructionBase & {
  readonly shape: "psi";
  readonly opcode: "Psi";
  d: RegisterOperand;
  readonly edges: PsiEdge[];
};

export type Instruction =
  | UnaryInstruction
  | BinaryInstruction
  | ComparisonInstruction
  | AtomicInstruction
  | StoreInstruction
  | BranchInstruction
  | CallInstruction
  | ReturnInstruction
  | BarrierInstruction
  | FenceInstruction
  | LaunchInstruction
  | PhiInstruction
  | PsiInstruction;

export type InstructionShape = Instruction["shape"];

export type InstructionOf<S extends InstructionShape> = Extract<Instruction, { readonly shape: S }>;

type GuardInit = { readonly guard?: PredicateOperand };

export type InstructionInit = GuardInit &
  (
    | { readonly shape: "unary"; readonly opcode: UnaryOpcode; readonly d: Operand; readonly a: Operand }
    | { readonly shape: "binary"; readonly opcode: BinaryOpcode; readonly d: Operand; readonly a: Operand; readonly b: Operand }
    | { readonly shape: "comparison"; readonly comparison: Comparison; readonly d: Operand; readonly a: Operand; readonly b: Operand }
    | {
        readonly shape: "atomic";
        readonly operation: AtomicOperation;
        readonly d: Operand;
        readonly a: Operand;
        readonly b: Operand;
        readonly c?: Operand;
      }
    | { readonly shape: "store"; readonly d: Operand; readonly a: Operand }
    | { readonly shape: "branch"; readonly modifier?: BranchModifier; readonly target?: Operand }
    | {
        readonly shape: "call";
        readonly target?: Operand;
        readonly returned?: readonly Operand[];
        readonly arguments?: readonly Operand[];
      }
    | { readonly shape: "return" }
    | { readonly shape: "barrier" }
    | { readonly shape: "fence"; readonly level: MemoryLevel }
    | { readonly shape: "launch" }
    | { readonly shape: "phi"; readonly d: RegisterOperand }
    | { readonly shape: "psi"; readonly d: RegisterOperand }
  );

function assertMutable(instruction: Instruction): void {
  instruction.block.function.assertMutable();
}

function ownedOperands(instruction: Instruction): readonly Operand[] {
  const owned = [...instructionWrites(instruction), ...instructionReads(instruction)];
  if (instruction.shape === "psi") {
    for (const edge of instruction.edges) owned.push(edge.predicate);
  }
  return owned;
}

function adopt(instruction: Instruction, ...operands: readonly Operand[]): void {
  for (const operand of operands) {
    if (operand.owner !== undefined && operand.owner !== instruction) {
      throw new Error(
        `Operand ${operandToString(operand)} is owned by instruction ${operand.owner.id}; clone it before reuse.`
      );
    }
  }
  for (const operand of operands) operand.owner = instruction;
}

/** Only `cas` reads a compare operand. */
function assertCompareOperand(operation: AtomicOperation, hasCompare: boolean): void {
  const needsCompare = operation === "cas";
  if (needsCompare && !hasCompare) throw new Error(`Atomic '${operation}' requires a compare operand.`);
  if (!needsCompare && hasCompare) throw new Error(`Atomic '${operation}' takes no compare operand.`);
}

function release(operand: Operand | undefined): void {
  if (operand) operand.owner = undefined;
}

function buildInstruction(block: BasicBlock, id: number, init: InstructionInit): Instruction {
  const guard = init.guard ?? alwaysTrue();
  switch (init.shape) {
    case "unary":
      return { shape: "unary", opcode: init.opcode, id, block, guard, d: init.d, a: init.a };
    case "binary":
      return { shape: "binary", opcode: init.opcode, id, block, guard, d: init.d, a: init.a, b: init.b };
    case "comparison":
      return {
        shape: "comparison",
        opcode: "Setp",
        comparison: init.comparison,
        id,
        block,
        guard,
        d: init.d,
        a: init.a,
        b: init.b,
      };
    case "atomic":
      return {
        shape: "atomic",
        opcode: "Atom",
        operation: init.operation,
        id,
        block,
        guard,
        d: init.d,
        a: init.a,
        b: init.b,
        c: init.c,
      };
    case "store":
      return { shape: "store", opcode: "St", id, block, guard, d: init.d, a: init.a };
    case "branch":
      return { shape: "branch", opcode: "Bra", modifier: init.modifier ?? "none", id, block, guard, target: init.target };
    case "call":
      return {
        shape: "call",
        opcode: "Call",
        id,
        block,
        guard,
        target: init.target,
        returned: [...(init.returned ?? [])],
        arguments: [...(init.arguments ?? [])],
      };
    case "return":
      return { shape: "return", opcode: "Ret", id, block, guard };
    case "barrier":
      return { shape: "barrier", opcode: "Bar", id, block, guard };
    case "fence":
      return { shape: "fence", opcode: "Membar", level: init.level, id, block, guard };
    case "launch":
      return { shape: "launch", opcode: "Launch", id, block, guard };
    case "phi":
      return { shape: "phi", opcode: "Phi", id, block, guard, d: init.d, edges: [] };
    case "psi":
      return { shape: "psi", opcode: "Psi", id, block, guard, d: init.d, edges: [] };
    default:
      return assertNever(init, "instruction shape");
  }
}

/**
 * Creates an instruction owned by `block` (not yet inserted). Every operand in
 * `init` must be unowned; the instruction takes ownership of all of them.
 */
export function createInstruction<I extends InstructionInit>(block: BasicBlock, init: I): InstructionOf<I["shape"]>;
export function createInstruction(block: BasicBlock, init: InstructionInit): Instruction {
  block.function.assertMutable();
  if (init.shape === "atomic") assertCompareOperand(init.operation, init.c !== undefined);
  const instruction = buildInstruction(block, block.function.allocateInstructionId(), init);
  const operands = ownedOperands(instruction);
  if (new Set(operands).size !== operands.length) {
    throw new Error(`Instruction ${instruction.id} would hold the same operand object in two slots.`);
  }
  adopt(instruction, ...operands);
  return instruction;
}

export function instructionReads(instruction: Instruction): readonly Operand[] {
  const { guard } = instruction;
  switch (instruction.shape) {
    case "unary":
    case "store":
      return [guard, instruction.a];
    case "binary":
    case "comparison":
      return [guard, instruction.a, instruction.b];
    case "atomic":
      return instruction.c === undefined
        ? [guard, instruction.a, instruction.b]
        : [guard, instruction.a, instruction.b, instruction.c];
    case "branch":
      return instruction.target === undefined ? [guard] : [guard, instruction.target];
    case "call":
      return instruction.target === undefined
        ? [guard, ...instruction.arguments]
        : [guard, instruction.target, ...instruction.arguments];
    case "return":
    case "barrier":
    case "fence":
    case "launch":
      return [guard];
    case "phi":
    case "psi":
      return [guard, ...instruction.edges.map((edge) => edge.value)];
  }
}

export function instructionWrites(instruction: Instruction): readonly Operand[] {
  switch (instruction.shape) {
    case "unary":
    case "binary":
    case "comparison":
    case "atomic":
    case "store":
    case "phi":
    case "psi":
      return [instruction.d];
    case "call":
      return [...instruction.returned];
    case "branch":
    case "return":
    case "barrier":
    case "fence":
    case "launch":
      return [];
  }
}

function replaceSlot<T extends Operand>(instruction: Instruction, previous: Operand | undefined, next: T): T {
  assertMutable(instruction);
  adopt(instruction, next);
  if (previous !== next) release(previous);
  return next;
}

export function setGuard(instruction: Instruction, guard: PredicateOperand): void {
  instruction.guard = replaceSlot(instruction, instruction.guard, guard);
}

type WithA = UnaryInstruction | BinaryInstruction | ComparisonInstruction | AtomicInstruction | StoreInstruction;
type WithB = BinaryInstruction | ComparisonInstruction | AtomicInstruction;

export function setD(instruction: PhiInstruction | PsiInstruction, operand: RegisterOperand): void;
export function setD(instruction: WithA, operand: Operand): void;
export function setD(instruction: WithA | PhiInstruction | PsiInstruction, operand: Operand): void {
  if (instruction.shape === "phi" || instruction.shape === "psi") {
    if (operand.kind !== "register") {
      throw new Error(`${instruction.opcode} ${instruction.id} must write a register.`);
    }
    instruction.d = replaceSlot(instruction, instruction.d, operand);
    return;
  }
  instruction.d = replaceSlot(instruction, instruction.d, operand);
}

export function setA(instruction: WithA, operand: Operand): void {
  instruction.a = replaceSlot(instruction, instruction.a, operand);
}

export function setB(instruction: WithB, operand: Operand): void {
  instruction.b = replaceSlot(instruction, instruction.b, operand);
}

export function setC(instruction: AtomicInstruction, operand: Operand | undefined): void {
  assertCompareOperand(instruction.operation, operand !== undefined);
  if (operand === undefined) {
    assertMutable(instruction);
    release(instruction.c);
    instruction.c = undefined;
    return;
  }
  instruction.c = replaceSlot(instruction, instruction.c, operand);
}

export function setTarget(instruction: BranchInstruction | CallInstruction, target: Operand): void {
  instruction.target = replaceSlot(instruction, instruction.target, target);
}

export function addReturn(call: CallInstruction, operand: Operand): void {
  assertMutable(call);
  adopt(call, operand);
  call.returned.push(operand);
}

export function addArgument(call: CallInstruction, operand: Operand): void {
  assertMutable(call);
  adopt(call, operand);
  call.arguments.push(operand);
}

function isPredicateKey(key: BasicBlock | PredicateOperand): key is PredicateOperand {
  return "kind" in key;
}

export function addSource(phi: PhiInstruction, value: RegisterOperand, predecessor: BasicBlock): void;
export function addSource(psi: PsiInstruction, value: RegisterOperand, predicate: PredicateOperand): void;
export function addSource(
  instruction: PhiInstruction | PsiInstruction,
  value: RegisterOperand,
  key: BasicBlock | PredicateOperand
): void {
  assertMutable(instruction);
  if (instruction.shape === "phi") {
    if (isPredicateKey(key)) throw new Error(`Phi ${instruction.id} sources are keyed by predecessor block.`);
    adopt(instruction, value);
    instruction.edges.push({ predecessor: key, value });
    return;
  }
  if (!isPredicateKey(key)) throw new Error(`Psi ${instruction.id} sources are keyed by predicate.`);
  adopt(instruction, value, key);
  instruction.edges.push({ predicate: key, value });
}

export function removeSource(phi: PhiInstruction, predecessor: BasicBlock): void;
export function removeSource(psi: PsiInstruction, predicate: PredicateOperand): void;
export function removeSource(instruction: PhiInstruction | PsiInstruction, key: BasicBlock | PredicateOperand): void {
  assertMutable(instruction);
  if (instruction.shape === "phi") {
    const index = instruction.edges.findIndex((edge) => edge.predecessor === key);
    const edge = instruction.edges[index];
    if (!edge) {
      const name = isPredicateKey(key) ? operandToString(key) : key.name;
      throw new Error(`Block '${name}' is not a recorded predecessor of phi ${instruction.id}.`);
    }
    instruction.edges.splice(index, 1);
    release(edge.value);
    return;
  }
  const index = instruction.edges.findIndex((edge) => isPredicateKey(key) && predicateEquals(edge.predicate, key));
  const edge = instruction.edges[index];
  if (!edge) {
    const name = isPredicateKey(key) ? operandToString(key) : key.name;
    throw new Error(`Predicate ${name} does not guard a source of psi ${instruction.id}.`);
  }
  instruction.edges.splice(index, 1);
  release(edge.value);
  release(edge.predicate);
}

function copyShape(instruction: Instruction): Instruction {
  const guard = cloneOperand(instruction.guard);
  switch (instruction.shape) {
    case "unary":
    case "store":
      return { ...instruction, guard, d: cloneOperand(instruction.d), a: cloneOperand(instruction.a) };
    case "binary":
    case "comparison":
      return {
        ...instruction,
        guard,
        d: cloneOperand(instruction.d),
        a: cloneOperand(instruction.a),
        b: cloneOperand(instruction.b),
      };
    case "atomic":
      return {
        ...instruction,
        guard,
        d: cloneOperand(instruction.d),
        a: cloneOperand(instruction.a),
        b: cloneOperand(instruction.b),
        c: instruction.c && cloneOperand(instruction.c),
      };
    case "branch":
      return { ...instruction, guard, target: instruction.target && cloneOperand(instruction.target) };
    case "call":
      return {
        ...instruction,
        guard,
        target: instruction.target && cloneOperand(instruction.target),
        returned: instruction.returned.map((operand) => cloneOperand(operand)),
        arguments: instruction.arguments.map((operand) => cloneOperand(operand)),
      };
    case "return":
    case "barrier":
    case "fence":
    case "launch":
      return { ...instruction, guard };
    case "phi":
      return {
        ...instruction,
        guard,
        d: cloneOperand(instruction.d),
        edges: instruction.edges.map((edge) => ({ predecessor: edge.predecessor, value: cloneOperand(edge.value) })),
      };
    case "psi":
      return {
        ...instruction,
        guard,
        d: cloneOperand(instruction.d),
        edges: instruction.edges.map((edge) => ({
          predicate: cloneOperand(edge.predicate),
          value: cloneOperand(edge.value),
        })),
      };
  }
}

/**
 * Operand-for-operand deep copy with the same id and block. The copy is not
 * inserted anywhere.
 */
export function cloneInstruction<I extends Instruction>(instruction: I): I;
export function cloneInstruction(instruction: Instruction): Instruction {
  const copy = copyShape(instruction);
  for (const operand of ownedOperands(copy)) operand.owner = copy;
  return copy;
}

export function isLoad(instruction: Instruction): boolean {
  return instruction.opcode === "Ld" || instruction.opcode === "Atom";
}

export function isStore(instruction: Instruction): boolean {
  return instruction.opcode === "St" || instruction.opcode === "Atom";
}

export function isBranch(instruction: Instruction): boolean {
  return instruction.opcode === "Bra" || instruction.opcode === "Call";
}

export function isCall(instruction: Instruction): instruction is CallInstruction {
  return instruction.shape === "call";
}

export function isUnary(instruction: Instruction): instruction is UnaryInstruction {
  return instruction.shape === "unary";
}

/** Comparison and atomic instructions extend the binary shape. */
export function isBinary(
  instruction: Instruction
): instruction is BinaryInstruction | ComparisonInstruction | AtomicInstruction {
  return instruction.shape === "binary" || instruction.shape === "comparison" || instruction.shape === "atomic";
}

export function isUnconditional(branch: BranchInstruction): boolean {
  return isAlwaysTrue(branch.guard);
}

export function targetBasicBlock(branch: BranchInstruction): BasicBlock {
  const { target } = branch;
  if (target === undefined) {
    throw new Error(`Branch ${branch.id} has no target.`);
  }
  if (!isBasicBlockAddress(target)) {
    throw new Error(`Branch ${branch.id} targets ${operandToString(target)}, which is not a basic block.`);
  }
  return target.target.block;
}

function mnemonic(instruction: Instruction): string {
  switch (instruction.shape) {
    case "comparison":
      return `${instruction.opcode}.${instruction.comparison}`;
    case "atomic":
      return `${instruction.opcode}.${instruction.operation}`;
    case "fence":
      return `${instruction.opcode}.${instruction.level}`;
    case "branch":
      return instruction.modifier === "uniform" ? `${instruction.opcode}.uni` : instruction.opcode;
    default:
      return instruction.opcode;
  }
}

function readsToStrings(instruction: Instruction): readonly string[] {
  switch (instruction.shape) {
    case "phi":
      return instruction.edges.map((edge) => `[${operandToString(edge.value)}, ${edge.predecessor.name}]`);
    case "psi":
      return instruction.edges.map((edge) => `[${operandToString(edge.predicate)}, ${operandToString(edge.value)}]`);
    default:
      return instructionReads(instruction).slice(1).map(operandToString);
  }
}

/** Diagnostic rendering: `[guard ]Opcode[.tag] writes, reads`. */
export function instructionToString(instruction: Instruction): string {
  const guard = isAlwaysTrue(instruction.guard) ? "" : `${operandToString(instruction.guard)} `;
  const operands = [...instructionWrites(instruction).map(operandToString), ...readsToStrings(instruction)];
  const tail = operands.length === 0 ? "" : ` ${operands.join(", ")}`;
  return `${guard}${mnemonic(instruction)}${tail}`;
}
