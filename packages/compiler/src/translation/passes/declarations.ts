import type { IrFunction, Module } from "@vgpu/ir";

import { targetTypeName, type SourceKernel } from "../../source/isa.js";
import type { KernelState, PassDeps } from "./contracts.js";
import { translateLinkage } from "./globals.js";

export function declareFunctionPass(module: Module, kernel: SourceKernel, deps: PassDeps): IrFunction {
  deps.log(1, `Translating kernel '${kernel.name}' (${kernel.linkingDirective})`);
  return module.newFunction(kernel.name, translateLinkage(kernel.linkingDirective));
}

/** Parameters become arguments in declaration order, before any operand can refer to them. */
export function declareArgumentsPass(state: KernelState, deps: PassDeps): void {
  for (const parameter of state.kernel.parameters) {
    deps.log(2, `Translating parameter .${parameter.type} ${parameter.name}`);
    state.fn.newArgument(deps.resolveType(targetTypeName(parameter.type)), parameter.name);
  }
}

export function declareRegistersPass(state: KernelState, deps: PassDeps): void {
  for (const register of state.kernel.registers) {
    const name = `r${register.id}`;
    deps.log(2, `Translating register .${register.type} ${name}`);
    if (state.registers.has(register.id)) {
      deps.fail("VIR1001", `Added duplicate virtual register '${name}'.`);
    }
    const declared = state.fn.newVirtualRegister(deps.resolveType(targetTypeName(register.type)), name);
    deps.log(3, `to ${declared.type.name} %${name} (id ${declared.id})`);
    state.registers.set(register.id, declared);
  }
}
