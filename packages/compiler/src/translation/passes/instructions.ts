import { createInstruction, instructionToString, type InstructionInit, type Operand } from "@vgpu/ir";

import {
  sourceInstructionToString,
  sourceOperandType,
  type SourceDataType,
  type SourceInstruction,
  type SourceOperand,
} from "../../source/isa.js";
import {
  isComplexOpcode,
  isControlOpcode,
  isSimpleBinaryOpcode,
  isSimpleUnaryInstruction,
  selectBinaryOpcode,
  selectComparison,
  selectConversionOpcode,
  type ControlOpcode,
  type SimpleBinaryOpcode,
  type SimpleUnaryOpcode,
} from "../opcode-selection.js";
import { userBlocks, type KernelState, type PassDeps } from "./contracts.js";
import { lowerOperand, lowerPredicate } from "./operands.js";

type OperandSlot = "d" | "a" | "b" | "c";

function requireOperand(instruction: SourceInstruction, slot: OperandSlot, deps: PassDeps): SourceOperand {
  const operand = instruction[slot];
  if (!operand) deps.fail("VIR2003", `Instruction has no '${slot}' operand.`);
  return operand;
}

function requireOperandType(instruction: SourceInstruction, slot: OperandSlot, deps: PassDeps): SourceDataType {
  const type = sourceOperandType(requireOperand(instruction, slot, deps));
  if (!type) deps.fail("VIR2003", `Operand '${slot}' carries no data type.`);
  return type;
}

function requireInstructionType(instruction: SourceInstruction, deps: PassDeps): SourceDataType {
  if (!instruction.type) deps.fail("VIR2003", `Instruction '${instruction.opcode}' carries no data type.`);
  return instruction.type;
}

function lowerSlot(state: KernelState, instruction: SourceInstruction, slot: OperandSlot, deps: PassDeps): Operand {
  return lowerOperand(state, requireOperand(instruction, slot, deps), deps);
}

function lowerBinary(
  state: KernelState,
  instruction: SourceInstruction,
  opcode: SimpleBinaryOpcode,
  deps: PassDeps
): InstructionInit {
  const selected = selectBinaryOpcode(opcode, requireInstructionType(instruction, deps));
  const guard = lowerPredicate(state, instruction.guard, deps);
  const d = lowerSlot(state, instruction, "d", deps);
  const a = lowerSlot(state, instruction, "a", deps);
  const b = lowerSlot(state, instruction, "b", deps);
  return { shape: "binary", opcode: selected, guard, d, a, b };
}

function lowerUnary(
  state: KernelState,
  instruction: SourceInstruction,
  opcode: SimpleUnaryOpcode,
  deps: PassDeps
): InstructionInit {
  const guard = lowerPredicate(state, instruction.guard, deps);
  const d = lowerSlot(state, instruction, "d", deps);
  const a = lowerSlot(state, instruction, "a", deps);
  switch (opcode) {
    case "st":
      return { shape: "store", guard, d, a };
    case "ld":
    case "ldu":
      return { shape: "unary", opcode: "Ld", guard, d, a };
    case "mov":
      return { shape: "unary", opcode: "Bitcast", guard, d, a };
    case "cvt": {
      const selected = selectConversionOpcode(
        requireOperandType(instruction, "d", deps),
        requireOperandType(instruction, "a", deps)
      );
      return { shape: "unary", opcode: selected, guard, d, a };
    }
  }
}

function lowerControl(
  state: KernelState,
  instruction: SourceInstruction,
  opcode: ControlOpcode,
  deps: PassDeps
): InstructionInit {
  const guard = lowerPredicate(state, instruction.guard, deps);
  switch (opcode) {
    case "bra":
      return {
        shape: "branch",
        modifier: instruction.uniform ? "uniform" : "none",
        guard,
        target: lowerSlot(state, instruction, "d", deps),
      };
    case "ret":
    case "exit":
      return { shape: "return", guard };
    case "bar":
      return { shape: "barrier", guard };
    case "membar": {
      if (!instruction.level) deps.fail("VIR2003", "Memory barrier carries no level.");
      return { shape: "fence", level: instruction.level, guard };
    }
    case "setp": {
      if (!instruction.comparison) deps.fail("VIR2003", "Comparison carries no comparison operator.");
      const comparison = selectComparison(instruction.comparison, requireInstructionType(instruction, deps));
      const d = lowerSlot(state, instruction, "d", deps);
      const a = lowerSlot(state, instruction, "a", deps);
      const b = lowerSlot(state, instruction, "b", deps);
      return { shape: "comparison", comparison, guard, d, a, b };
    }
    case "atom": {
      if (!instruction.atomicOperation) deps.fail("VIR2003", "Atomic instruction carries no operation.");
      const operation = instruction.atomicOperation;
      if (operation === "cas" && instruction.c === undefined) {
        deps.fail("VIR2003", "Atomic 'cas' carries no compare operand 'c'.");
      }
      if (operation !== "cas" && instruction.c !== undefined) {
        deps.fail("VIR2003", `Atomic '${operation}' takes no compare operand 'c'.`);
      }
      const d = lowerSlot(state, instruction, "d", deps);
      const a = lowerSlot(state, instruction, "a", deps);
      const b = lowerSlot(state, instruction, "b", deps);
      if (instruction.c === undefined) return { shape: "atomic", operation, guard, d, a, b };
      return { shape: "atomic", operation, guard, d, a, b, c: lowerOperand(state, instruction.c, deps) };
    }
  }
}

/** Complex opcodes are checked first, then the simple binary and unary sets, then control and synchronization. */
export function selectInstruction(state: KernelState, instruction: SourceInstruction, deps: PassDeps): InstructionInit {
  const { opcode } = instruction;
  if (isComplexOpcode(opcode)) {
    deps.fail("VIR2002", `No translation available for instruction ${sourceInstructionToString(instruction)}.`);
  }
  if (isSimpleBinaryOpcode(opcode)) return lowerBinary(state, instruction, opcode, deps);
  if (isSimpleUnaryInstruction(instruction)) return lowerUnary(state, instruction, instruction.opcode, deps);
  if (isControlOpcode(opcode)) return lowerControl(state, instruction, opcode, deps);
  return deps.fail("VIR2001", `No translation implemented for instruction ${sourceInstructionToString(instruction)}.`);
}

/**
 * Second walk: lowers every instruction into the block created for its label.
 * Each instruction is fully lowered before it is created and appended.
 */
export function lowerInstructionsPass(state: KernelState, deps: PassDeps): void {
  for (const source of userBlocks(state.kernel)) {
    const block = state.blocks.get(source.label);
    if (!block) deps.fail("VIR1004", `Basic block ${source.label} was not declared in this function.`);
    state.block = block;
    deps.log(2, `Translating basic block ${source.label}`);

    for (const instruction of source.instructions) {
      state.instruction = instruction;
      deps.log(3, `Translating instruction ${sourceInstructionToString(instruction)}`);
      const lowered = createInstruction(block, selectInstruction(state, instruction, deps));
      block.push(lowered);
      deps.log(4, `to ${instructionToString(lowered)}`);
    }
  }
  state.instruction = undefined;
  state.block = undefined;
}
