export { BasicBlock } from "./basic-block.js";
export { asReadonlyMap, assertNever } from "./contracts.js";
export type { Argument, VirtualRegister } from "./function.js";
export { IrFunction } from "./function.js";
export type {
  AtomicInstruction,
  AtomicOperation,
  BarrierInstruction,
  BinaryInstruction,
  BinaryOpcode,
  BranchInstruction,
  BranchModifier,
  CallInstruction,
  Comparison,
  ComparisonInstruction,
  ConversionOpcode,
  FenceInstruction,
  Instruction,
  InstructionInit,
  InstructionOf,
  InstructionShape,
  LaunchInstruction,
  MemoryLevel,
  Opcode,
  PhiEdge,
  PhiInstruction,
  PsiEdge,
  PsiInstruction,
  ReturnInstruction,
  StoreInstruction,
  UnaryInstruction,
  UnaryOpcode,
} from "./instructions.js";
export {
  addArgument,
  addReturn,
  addSource,
  cloneInstruction,
  createInstruction,
  instructionReads,
  instructionToString,
  instructionWrites,
  isBinary,
  isBranch,
  isCall,
  isLoad,
  isStore,
  isUnary,
  isUnconditional,
  removeSource,
  setA,
  setB,
  setC,
  setD,
  setGuard,
  setTarget,
  targetBasicBlock,
} from "./instructions.js";
export type { Constant, Linkage } from "./module.js";
export { Global, Module } from "./module.js";
export type {
  AddressOperand,
  AddressTarget,
  ArgumentOperand,
  ImmediateOperand,
  IndirectOperand,
  Operand,
  PredicateModifier,
  PredicateOperand,
  RegisterOperand,
} from "./operands.js";
export {
  alwaysFalse,
  alwaysTrue,
  argumentOperand,
  basicBlockAddressOperand,
  cloneOperand,
  globalAddressOperand,
  immediateOperand,
  indirectOperand,
  isAlwaysTrue,
  isBasicBlockAddress,
  operandToString,
  predicateEquals,
  predicateOperand,
  registerOperand,
} from "./operands.js";
export type { FloatBits, FloatType, IntegerBits, IntegerType, Type, TypeRegistry } from "./types.js";
export { BUILTIN_TYPES, createTypeRegistry, floatType, integerType, lookupType, typeBytes } from "./types.js";
