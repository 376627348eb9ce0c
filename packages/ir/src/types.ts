import { asReadonlyMap } from "./contracts.js";

export type IntegerBits = 1 | 8 | 16 | 32 | 64;
export type FloatBits = 32 | 64;

export type IntegerType = {
  readonly kind: "integer";
  readonly name: string;
  readonly bits: IntegerBits;
};

export type FloatType = {
  readonly kind: "float";
  readonly name: string;
  readonly bits: FloatBits;
};

export type Type = IntegerType | FloatType;

/** Name-keyed lookup of target types. Snapshots are frozen once built. */
export type TypeRegistry = ReadonlyMap<string, Type>;

export function integerType(bits: IntegerBits, name = `i${bits}`): IntegerType {
  return { kind: "integer", name, bits };
}

export function floatType(bits: FloatBits, name = `f${bits}`): FloatType {
  return { kind: "float", name, bits };
}

export const BUILTIN_TYPES: readonly Type[] = Object.freeze([
  integerType(1),
  integerType(8),
  integerType(16),
  integerType(32),
  integerType(64),
  floatType(32),
  floatType(64),
]);

export function createTypeRegistry(extra: readonly Type[] = []): TypeRegistry {
  const types = new Map<string, Type>();
  for (const type of [...BUILTIN_TYPES, ...extra]) {
    if (types.has(type.name)) {
      throw new Error(`Type '${type.name}' is registered twice.`);
    }
    types.set(type.name, type);
  }
  return asReadonlyMap(types);
}

export function lookupType(registry: TypeRegistry, name: string): Type | undefined {
  return registry.get(name);
}

export function typeBytes(type: Type): number {
  return Math.max(1, type.bits / 8);
}
