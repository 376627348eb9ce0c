import { assertElementPosition, assertPosition } from "./contracts.js";
import { IrFunction } from "./function.js";
import type { Type } from "./types.js";

export type Linkage = "external" | "private";

export type Constant = {
  readonly kind: "bytes";
  readonly id: number;
  readonly bytes: Uint8Array;
  readonly module: Module;
};

export class Global {
  readonly name: string;
  readonly type: Type;
  readonly linkage: Linkage;
  readonly module: Module;
  #initializer: Constant | undefined;

  constructor(module: Module, name: string, type: Type, linkage: Linkage) {
    this.module = module;
    this.name = name;
    this.type = type;
    this.linkage = linkage;
  }

  get initializer(): Constant | undefined {
    return this.#initializer;
  }

  setInitializer(constant: Constant | undefined): void {
    this.module.assertMutable();
    if (constant && constant.module !== this.module) {
      throw new Error(`Initializer of global '${this.name}' must be a constant of module '${this.module.name}'.`);
    }
    this.#initializer = constant;
  }
}

/**
 * One compilation unit. Owns functions, globals and constants; everything
 * reachable from a module dies with it.
 *
 * Name lookups are first-match linear scans in declaration order and return
 * `undefined` when nothing matches.
 */
export class Module {
  readonly name: string;
  readonly #functions: IrFunction[] = [];
  readonly #globals: Global[] = [];
  readonly #constants: Constant[] = [];
  #nextConstantId = 0;
  #frozen = false;

  constructor(name: string) {
    this.name = name;
  }

  get functions(): readonly IrFunction[] {
    return this.#functions;
  }

  get globals(): readonly Global[] {
    return this.#globals;
  }

  get constants(): readonly Constant[] {
    return this.#constants;
  }

  get isFrozen(): boolean {
    return this.#frozen;
  }

  /** Ends construction; any later mutation of the module graph throws. */
  freeze(): void {
    this.#frozen = true;
  }

  assertMutable(): void {
    if (this.#frozen) {
      throw new Error(`Module '${this.name}' is frozen.`);
    }
  }

  newFunction(name: string, linkage: Linkage, position: number = this.#functions.length): IrFunction {
    this.assertMutable();
    assertPosition(position, this.#functions.length, "Function");
    const fn = new IrFunction(this, name, linkage);
    this.#functions.splice(position, 0, fn);
    return fn;
  }

  /** Returns the position of the function that followed the removed one. */
  removeFunction(position: number): number {
    this.assertMutable();
    assertElementPosition(position, this.#functions.length, "Function");
    this.#functions.splice(position, 1);
    return position;
  }

  getFunction(name: string): IrFunction | undefined {
    return this.#functions.find((fn) => fn.name === name);
  }

  newGlobal(name: string, type: Type, linkage: Linkage, position: number = this.#globals.length): Global {
    this.assertMutable();
    assertPosition(position, this.#globals.length, "Global");
    const global = new Global(this, name, type, linkage);
    this.#globals.splice(position, 0, global);
    return global;
  }

  removeGlobal(position: number): number {
    this.assertMutable();
    assertElementPosition(position, this.#globals.length, "Global");
    this.#globals.splice(position, 1);
    return position;
  }

  getGlobal(name: string): Global | undefined {
    return this.#globals.find((global) => global.name === name);
  }

  newConstant(bytes: Uint8Array): Constant {
    this.assertMutable();
    const constant: Constant = { kind: "bytes", id: this.#nextConstantId++, bytes: Uint8Array.from(bytes), module: this };
    this.#constants.push(constant);
    return constant;
  }
}
