import type { BasicBlock, IrFunction, Type, VirtualRegister } from "@vgpu/ir";

import type {
  SourceBlock,
  SourceInstruction,
  SourceKernel,
  SourceRegisterId,
  SourceSpecialRegister,
  SourceVectorLane,
} from "../../source/isa.js";

export type PassDeps = {
  /** Raises a TranslationError located at the current kernel and instruction. */
  readonly fail: (code: string, message: string) => never;
  readonly log: (depth: number, line: string) => void;
  /** Registry lookup; an unregistered name fails with UnknownType. */
  readonly resolveType: (name: string) => Type;
};

export type SpecialLaneKey = SourceVectorLane | "none";

/** Mutable tables for one kernel. Created per kernel and dropped with it. */
export type KernelState = {
  readonly kernel: SourceKernel;
  readonly fn: IrFunction;
  readonly registers: Map<SourceRegisterId, VirtualRegister>;
  readonly specialRegisters: Map<SourceSpecialRegister, Map<SpecialLaneKey, VirtualRegister>>;
  readonly blocks: Map<string, BasicBlock>;
  block: BasicBlock | undefined;
  instruction: SourceInstruction | undefined;
};

export function createKernelState(kernel: SourceKernel, fn: IrFunction): KernelState {
  return {
    kernel,
    fn,
    registers: new Map(),
    specialRegisters: new Map(),
    blocks: new Map(),
    block: undefined,
    instruction: undefined,
  };
}

/** Executable-order blocks without the entry and exit sentinels. */
export function userBlocks(kernel: SourceKernel): readonly SourceBlock[] {
  const { cfg } = kernel;
  return cfg.executableSequence().filter((block) => block !== cfg.entry && block !== cfg.exit);
}
