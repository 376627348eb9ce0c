import { createTypeRegistry, lookupType, Module, type Type, type TypeRegistry } from "@vgpu/ir";

/**
 * The compilation session around a translation: owns the type registry and
 * every module created through it.
 */
export class CompilationContext {
  readonly types: TypeRegistry;
  readonly #modules: Module[] = [];

  constructor(extraTypes: readonly Type[] = []) {
    this.types = createTypeRegistry(extraTypes);
  }

  get modules(): readonly Module[] {
    return this.#modules;
  }

  newModule(name: string): Module {
    const module = new Module(name);
    this.#modules.push(module);
    return module;
  }

  getModule(name: string): Module | undefined {
    return this.#modules.find((module) => module.name === name);
  }

  getType(name: string): Type | undefined {
    return lookupType(this.types, name);
  }
}
