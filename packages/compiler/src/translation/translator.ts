import { lookupType, type IrFunction, type Module, type Type, type TypeRegistry } from "@vgpu/ir";

import type { CompilationContext } from "../context.js";
import { sourceInstructionToString, type SourceKernel, type SourceModule } from "../source/isa.js";
import { fail, type TranslationSite } from "./errors.js";
import { createBlocksPass } from "./passes/blocks.js";
import { createKernelState, type KernelState, type PassDeps } from "./passes/contracts.js";
import { declareArgumentsPass, declareFunctionPass, declareRegistersPass } from "./passes/declarations.js";
import { translateGlobalsPass } from "./passes/globals.js";
import { lowerInstructionsPass } from "./passes/instructions.js";

export type TranslateOptions = {
  readonly types: TypeRegistry;
  /** Receives one line per translation step, indented by depth. */
  readonly log?: (line: string) => void;
};

function resolveType(types: TypeRegistry, name: string, site: () => TranslationSite): Type {
  const type = lookupType(types, name);
  if (!type) fail("VIR3001", `Translated type name '${name}' is not a valid target type.`, site());
  return type;
}

function createPassDeps(options: TranslateOptions, site: () => TranslationSite): PassDeps {
  const sink = options.log;
  return {
    fail: (code, message) => fail(code, message, site()),
    log: (depth, line) => sink?.(`${" ".repeat(depth)}${line}`),
    resolveType: (name) => resolveType(options.types, name, site),
  };
}

function kernelSite(state: KernelState): TranslationSite {
  if (!state.instruction) return { kernel: state.kernel.name };
  return { kernel: state.kernel.name, instruction: sourceInstructionToString(state.instruction) };
}

/**
 * All-or-nothing: when any pass fails the partially built function is removed
 * from the module before the error propagates.
 */
function translateKernel(module: Module, kernel: SourceKernel, options: TranslateOptions): IrFunction {
  const fn = declareFunctionPass(module, kernel, createPassDeps(options, () => ({ kernel: kernel.name })));
  const state = createKernelState(kernel, fn);
  const deps = createPassDeps(options, () => kernelSite(state));
  try {
    declareArgumentsPass(state, deps);
    declareRegistersPass(state, deps);
    createBlocksPass(state, deps);
    lowerInstructionsPass(state, deps);
  } catch (error) {
    module.removeFunction(module.functions.indexOf(fn));
    throw error;
  }
  return fn;
}

/**
 * Translates globals, then each kernel in order, into `module`. A failing
 * kernel leaves the kernels translated before it in place.
 */
export function translateModule(source: SourceModule, module: Module, options: TranslateOptions): Module {
  const deps = createPassDeps(options, () => ({}));
  deps.log(0, `Translating module '${source.path}'`);
  translateGlobalsPass(source, module, deps);
  for (const kernel of source.kernels) {
    translateKernel(module, kernel, options);
  }
  return module;
}

/** Creates a module named after the source path in `context` and translates into it. */
export function translateSourceModule(
  context: CompilationContext,
  source: SourceModule,
  log?: (line: string) => void
): Module {
  const module = context.newModule(source.path);
  return translateModule(source, module, { types: context.types, log });
}
