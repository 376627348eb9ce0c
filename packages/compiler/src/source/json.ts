import { readFileSync } from "node:fs";

import { asArray, asBoolean, asEnum, asInteger, asRecord, asString, assertKnownKeys } from "../json-fields.js";
import {
  createSourceCfg,
  SOURCE_ADDRESS_SPACES,
  SOURCE_ATOMIC_OPERATIONS,
  SOURCE_ATTRIBUTES,
  SOURCE_COMPARISONS,
  SOURCE_DATA_TYPES,
  SOURCE_MEMORY_LEVELS,
  SOURCE_MODIFIERS,
  SOURCE_OPCODES,
  SOURCE_SPECIAL_REGISTERS,
  SOURCE_VECTOR_LANES,
  type SourceAddressingMode,
  type SourceBlock,
  type SourceDataType,
  type SourceGlobal,
  type SourceInstruction,
  type SourceKernel,
  type SourceModule,
  type SourceOperand,
  type SourceParameter,
  type SourcePredicate,
  type SourceRegister,
} from "./isa.js";

const ADDRESSING_MODES = [
  "register",
  "indirect",
  "immediate",
  "address",
  "label",
  "special",
  "bitBucket",
  "functionName",
] as const satisfies readonly SourceAddressingMode[];

const PREDICATE_CONDITIONS = ["pt", "npt", "pred", "invPred"] as const satisfies readonly SourcePredicate["condition"][];

/** Builds the `<document>: '<json path>'` labels used in validation messages. */
type Label = (path: string) => string;

function parseDataType(value: unknown, label: string): SourceDataType {
  return asEnum(value, SOURCE_DATA_TYPES, label);
}

function parseRegisterId(value: unknown, label: string): number {
  const id = asInteger(value, label);
  if (id < 0) throw new Error(`${label} must not be negative.`);
  return id;
}

const MIN_IMMEDIATE = -(1n << 63n);
const MAX_IMMEDIATE = (1n << 64n) - 1n;

function parseImmediateBits(value: unknown, label: string): bigint {
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === "string" && /^(-?\d+|0x[0-9a-f]+)$/i.test(value)) return BigInt(value);
  throw new Error(`${label} must be a safe integer or a decimal or 0x-prefixed string.`);
}

function parseImmediate(value: unknown, label: string): bigint {
  const bits = parseImmediateBits(value, label);
  if (bits < MIN_IMMEDIATE || bits > MAX_IMMEDIATE) {
    throw new Error(`${label} must fit in 64 bits (-2^63 .. 2^64-1).`);
  }
  return bits;
}

function parseOperand(value: unknown, path: string, at: Label): SourceOperand {
  const raw = asRecord(value, at(path));
  const mode = asEnum(raw.mode, ADDRESSING_MODES, at(`${path}.mode`));
  switch (mode) {
    case "register":
      assertKnownKeys(raw, ["mode", "type", "reg"], at(path));
      return { mode, type: parseDataType(raw.type, at(`${path}.type`)), reg: parseRegisterId(raw.reg, at(`${path}.reg`)) };
    case "indirect":
      assertKnownKeys(raw, ["mode", "type", "reg", "offset"], at(path));
      return {
        mode,
        type: parseDataType(raw.type, at(`${path}.type`)),
        reg: parseRegisterId(raw.reg, at(`${path}.reg`)),
        offset: raw.offset === undefined ? 0 : asInteger(raw.offset, at(`${path}.offset`)),
      };
    case "immediate":
      assertKnownKeys(raw, ["mode", "type", "value"], at(path));
      return { mode, type: parseDataType(raw.type, at(`${path}.type`)), value: parseImmediate(raw.value, at(`${path}.value`)) };
    case "address":
      assertKnownKeys(raw, ["mode", "identifier", "isArgument"], at(path));
      return {
        mode,
        identifier: asString(raw.identifier, at(`${path}.identifier`)),
        isArgument: raw.isArgument === undefined ? false : asBoolean(raw.isArgument, at(`${path}.isArgument`)),
      };
    case "label":
    case "functionName":
      assertKnownKeys(raw, ["mode", "identifier"], at(path));
      return { mode, identifier: asString(raw.identifier, at(`${path}.identifier`)) };
    case "special": {
      assertKnownKeys(raw, ["mode", "type", "special", "lane"], at(path));
      const type = parseDataType(raw.type, at(`${path}.type`));
      const special = asEnum(raw.special, SOURCE_SPECIAL_REGISTERS, at(`${path}.special`));
      if (raw.lane === undefined) return { mode, type, special };
      return { mode, type, special, lane: asEnum(raw.lane, SOURCE_VECTOR_LANES, at(`${path}.lane`)) };
    }
    case "bitBucket":
      assertKnownKeys(raw, ["mode", "type"], at(path));
      return { mode, type: parseDataType(raw.type, at(`${path}.type`)) };
  }
}

function parsePredicate(value: unknown, path: string, at: Label): SourcePredicate {
  if (value === undefined) return { condition: "pt" };
  const raw = asRecord(value, at(path));
  const condition = asEnum(raw.condition, PREDICATE_CONDITIONS, at(`${path}.condition`));
  if (condition === "pt" || condition === "npt") {
    assertKnownKeys(raw, ["condition"], at(path));
    return { condition };
  }
  assertKnownKeys(raw, ["condition", "reg"], at(path));
  return { condition, reg: parseRegisterId(raw.reg, at(`${path}.reg`)) };
}

function parseInstruction(value: unknown, path: string, at: Label): SourceInstruction {
  const raw = asRecord(value, at(path));
  assertKnownKeys(
    raw,
    ["opcode", "type", "addressSpace", "modifiers", "comparison", "atomicOperation", "level", "uniform", "guard", "d", "a", "b", "c"],
    at(path)
  );
  const optionalOperand = (key: "d" | "a" | "b" | "c"): SourceOperand | undefined =>
    raw[key] === undefined ? undefined : parseOperand(raw[key], `${path}.${key}`, at);
  const modifiers =
    raw.modifiers === undefined
      ? []
      : asArray(raw.modifiers, at(`${path}.modifiers`)).map((entry, index) =>
          asEnum(entry, SOURCE_MODIFIERS, at(`${path}.modifiers[${index}]`))
        );

  return {
    opcode: asEnum(raw.opcode, SOURCE_OPCODES, at(`${path}.opcode`)),
    type: raw.type === undefined ? undefined : parseDataType(raw.type, at(`${path}.type`)),
    addressSpace:
      raw.addressSpace === undefined ? "generic" : asEnum(raw.addressSpace, SOURCE_ADDRESS_SPACES, at(`${path}.addressSpace`)),
    modifiers,
    comparison: raw.comparison === undefined ? undefined : asEnum(raw.comparison, SOURCE_COMPARISONS, at(`${path}.comparison`)),
    atomicOperation:
      raw.atomicOperation === undefined
        ? undefined
        : asEnum(raw.atomicOperation, SOURCE_ATOMIC_OPERATIONS, at(`${path}.atomicOperation`)),
    level: raw.level === undefined ? undefined : asEnum(raw.level, SOURCE_MEMORY_LEVELS, at(`${path}.level`)),
    uniform: raw.uniform === undefined ? false : asBoolean(raw.uniform, at(`${path}.uniform`)),
    guard: parsePredicate(raw.guard, `${path}.guard`, at),
    d: optionalOperand("d"),
    a: optionalOperand("a"),
    b: optionalOperand("b"),
    c: optionalOperand("c"),
  };
}

function parseBlock(value: unknown, path: string, at: Label): SourceBlock {
  const raw = asRecord(value, at(path));
  assertKnownKeys(raw, ["label", "instructions"], at(path));
  return {
    label: asString(raw.label, at(`${path}.label`)),
    instructions: asArray(raw.instructions ?? [], at(`${path}.instructions`)).map((entry, index) =>
      parseInstruction(entry, `${path}.instructions[${index}]`, at)
    ),
  };
}

function parseParameter(value: unknown, path: string, at: Label): SourceParameter {
  const raw = asRecord(value, at(path));
  assertKnownKeys(raw, ["name", "type"], at(path));
  return { name: asString(raw.name, at(`${path}.name`)), type: parseDataType(raw.type, at(`${path}.type`)) };
}

function parseRegister(value: unknown, path: string, at: Label): SourceRegister {
  const raw = asRecord(value, at(path));
  assertKnownKeys(raw, ["id", "type"], at(path));
  return { id: parseRegisterId(raw.id, at(`${path}.id`)), type: parseDataType(raw.type, at(`${path}.type`)) };
}

function parseKernel(value: unknown, path: string, at: Label): SourceKernel {
  const raw = asRecord(value, at(path));
  assertKnownKeys(raw, ["name", "linkingDirective", "parameters", "registers", "blocks"], at(path));
  const blocks = asArray(raw.blocks, at(`${path}.blocks`)).map((entry, index) =>
    parseBlock(entry, `${path}.blocks[${index}]`, at)
  );
  return {
    name: asString(raw.name, at(`${path}.name`)),
    linkingDirective:
      raw.linkingDirective === undefined
        ? "none"
        : asEnum(raw.linkingDirective, SOURCE_ATTRIBUTES, at(`${path}.linkingDirective`)),
    parameters: asArray(raw.parameters ?? [], at(`${path}.parameters`)).map((entry, index) =>
      parseParameter(entry, `${path}.parameters[${index}]`, at)
    ),
    registers: asArray(raw.registers ?? [], at(`${path}.registers`)).map((entry, index) =>
      parseRegister(entry, `${path}.registers[${index}]`, at)
    ),
    cfg: createSourceCfg(blocks),
  };
}

function parseInitializer(value: unknown, path: string, at: Label): Uint8Array {
  const bytes = asArray(value, at(path)).map((entry, index) => {
    const byte = asInteger(entry, at(`${path}[${index}]`));
    if (byte < 0 || byte > 255) throw new Error(`${at(`${path}[${index}]`)} must be a byte value (0..255).`);
    return byte;
  });
  return Uint8Array.from(bytes);
}

function parseGlobal(value: unknown, path: string, at: Label): SourceGlobal {
  const raw = asRecord(value, at(path));
  assertKnownKeys(raw, ["name", "type", "attribute", "addressSpace", "initializer"], at(path));
  const global: SourceGlobal = {
    name: asString(raw.name, at(`${path}.name`)),
    type: parseDataType(raw.type, at(`${path}.type`)),
    attribute: raw.attribute === undefined ? "none" : asEnum(raw.attribute, SOURCE_ATTRIBUTES, at(`${path}.attribute`)),
    addressSpace:
      raw.addressSpace === undefined ? "global" : asEnum(raw.addressSpace, SOURCE_ADDRESS_SPACES, at(`${path}.addressSpace`)),
  };
  if (raw.initializer === undefined) return global;
  return { ...global, initializer: parseInitializer(raw.initializer, `${path}.initializer`, at) };
}

/**
 * Validates a parsed-module document. `document` names the input in error
 * messages, which take the form `<document>: '<json path>' must be ...`.
 */
export function parseSourceModuleJson(value: unknown, document = "source module"): SourceModule {
  const at: Label = (path) => `${document}: '${path}'`;
  const root = asRecord(value, document);
  assertKnownKeys(root, ["path", "globals", "kernels"], document);

  const globals = new Map<string, SourceGlobal>();
  asArray(root.globals ?? [], at("globals")).forEach((entry, index) => {
    const global = parseGlobal(entry, `globals[${index}]`, at);
    if (globals.has(global.name)) {
      throw new Error(`${at(`globals[${index}].name`)}: duplicate global '${global.name}'.`);
    }
    globals.set(global.name, global);
  });

  return {
    path: asString(root.path, at("path")),
    globals,
    kernels: asArray(root.kernels ?? [], at("kernels")).map((entry, index) => parseKernel(entry, `kernels[${index}]`, at)),
  };
}

export function loadSourceModuleFile(path: string): SourceModule {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parseSourceModuleJson(raw, path);
}
