import type { Linkage, Module } from "@vgpu/ir";

import { targetTypeName, type SourceAttribute, type SourceModule } from "../../source/isa.js";
import type { PassDeps } from "./contracts.js";

/** Only an explicit `extern` is externally visible. */
export function translateLinkage(attribute: SourceAttribute): Linkage {
  return attribute === "extern" ? "external" : "private";
}

export function translateGlobalsPass(source: SourceModule, module: Module, deps: PassDeps): void {
  for (const global of source.globals.values()) {
    deps.log(1, `Translating global ${global.attribute} .${global.addressSpace} .${global.type} ${global.name}`);
    const translated = module.newGlobal(global.name, deps.resolveType(targetTypeName(global.type)), translateLinkage(global.attribute));
    if (global.initializer && global.initializer.length > 0) {
      translated.setInitializer(module.newConstant(global.initializer));
    }
  }
}
