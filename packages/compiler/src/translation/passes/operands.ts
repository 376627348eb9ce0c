import {
  alwaysFalse,
  alwaysTrue,
  argumentOperand,
  basicBlockAddressOperand,
  globalAddressOperand,
  immediateOperand,
  indirectOperand,
  predicateOperand,
  registerOperand,
  type Argument,
  type BasicBlock,
  type Global,
  type Operand,
  type PredicateOperand,
  type VirtualRegister,
} from "@vgpu/ir";

import {
  sourceOperandToString,
  targetTypeName,
  VECTOR_SPECIAL_REGISTERS,
  type SourceOperand,
  type SourcePredicate,
  type SourceRegisterId,
  type SourceSpecialRegister,
  type SourceVectorLane,
} from "../../source/isa.js";
import type { KernelState, PassDeps, SpecialLaneKey } from "./contracts.js";

function getRegister(state: KernelState, id: SourceRegisterId, deps: PassDeps): VirtualRegister {
  const register = state.registers.get(id);
  if (!register) deps.fail("VIR1002", `Source register r${id} used without declaration.`);
  return register;
}

function getGlobal(state: KernelState, name: string, deps: PassDeps): Global {
  const global = state.fn.module.getGlobal(name);
  if (!global) deps.fail("VIR1003", `Global variable ${name} used without declaration.`);
  return global;
}

function getBasicBlock(state: KernelState, label: string, deps: PassDeps): BasicBlock {
  const block = state.blocks.get(label);
  if (!block) deps.fail("VIR1004", `Basic block ${label} was not declared in this function.`);
  return block;
}

function getArgument(state: KernelState, name: string, deps: PassDeps): Argument {
  const argument = state.fn.getArgument(name);
  if (!argument) deps.fail("VIR1005", `Argument ${name} was not declared in this function.`);
  return argument;
}

function specialRegisterName(special: SourceSpecialRegister, lane: SourceVectorLane | undefined): string {
  return lane !== undefined && VECTOR_SPECIAL_REGISTERS.has(special) ? `${special}_${lane}` : special;
}

/** One i32 register per (special register, lane) for the whole kernel. */
export function getSpecialRegister(
  state: KernelState,
  special: SourceSpecialRegister,
  lane: SourceVectorLane | undefined,
  deps: PassDeps
): VirtualRegister {
  let lanes = state.specialRegisters.get(special);
  if (!lanes) {
    lanes = new Map();
    state.specialRegisters.set(special, lanes);
  }
  // Scalar special registers have no lanes.
  const key: SpecialLaneKey = lane !== undefined && VECTOR_SPECIAL_REGISTERS.has(special) ? lane : "none";
  const cached = lanes.get(key);
  if (cached) return cached;

  const register = state.fn.newVirtualRegister(deps.resolveType("i32"), specialRegisterName(special, lane));
  lanes.set(key, register);
  return register;
}

function isParameterContext(state: KernelState): boolean {
  return state.instruction?.addressSpace === "param";
}

export function lowerOperand(state: KernelState, operand: SourceOperand, deps: PassDeps): Operand {
  switch (operand.mode) {
    case "register":
      return registerOperand(getRegister(state, operand.reg, deps));
    case "indirect":
      return indirectOperand(getRegister(state, operand.reg, deps), operand.offset);
    case "immediate":
      return immediateOperand(operand.value, deps.resolveType(targetTypeName(operand.type)));
    case "address":
      if (operand.isArgument && isParameterContext(state)) {
        return argumentOperand(getArgument(state, operand.identifier, deps));
      }
      return globalAddressOperand(getGlobal(state, operand.identifier, deps));
    case "label":
      return basicBlockAddressOperand(getBasicBlock(state, operand.identifier, deps));
    case "special":
      return registerOperand(getSpecialRegister(state, operand.special, operand.lane, deps));
    case "bitBucket":
      // Fresh each time: the write has no observable destination.
      return registerOperand(state.fn.newVirtualRegister(deps.resolveType("i64")));
    case "functionName":
      return deps.fail(
        "VIR2004",
        `No translation implemented for operand ${sourceOperandToString(operand)} (addressing mode '${operand.mode}').`
      );
  }
}

export function lowerPredicate(state: KernelState, guard: SourcePredicate, deps: PassDeps): PredicateOperand {
  switch (guard.condition) {
    case "pt":
      return alwaysTrue();
    case "npt":
      return alwaysFalse();
    case "pred":
      return predicateOperand("straight", getRegister(state, guard.reg, deps));
    case "invPred":
      return predicateOperand("inverted", getRegister(state, guard.reg, deps));
  }
}
