import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { asArray, asBoolean, asEnum, asInteger, asRecord, asString, assertKnownKeys } from "@vgpu/compiler";
import { floatType, integerType, type FloatBits, type IntegerBits, type Type } from "@vgpu/ir";

export const PROJECT_CONFIG_FILE = "vgpu.json";

export type ProjectConfig = {
  readonly schema: 1;
  /** Parsed source module, relative to the project root. */
  readonly input: string;
  readonly verbose: boolean;
  readonly types: readonly Type[];
};

export type ProjectContext = {
  readonly projectRoot: string;
  readonly project: ProjectConfig;
};

const TYPE_KINDS = ["integer", "float"] as const;
const INTEGER_BITS: readonly IntegerBits[] = [1, 8, 16, 32, 64];
const FLOAT_BITS: readonly FloatBits[] = [32, 64];

function parseExtraType(value: unknown, index: number): Type {
  const at = (field?: string): string =>
    `${PROJECT_CONFIG_FILE}: 'types[${index}]${field === undefined ? "" : `.${field}`}'`;
  const raw = asRecord(value, at());
  assertKnownKeys(raw, ["name", "kind", "bits"], at());

  const name = asString(raw.name, at("name"));
  const kind = asEnum(raw.kind, TYPE_KINDS, at("kind"));
  const bits = asInteger(raw.bits, at("bits"));
  if (kind === "integer") {
    const width = INTEGER_BITS.find((candidate) => candidate === bits);
    if (width === undefined) throw new Error(`${at("bits")} must be one of ${INTEGER_BITS.join(", ")}.`);
    return integerType(width, name);
  }
  const width = FLOAT_BITS.find((candidate) => candidate === bits);
  if (width === undefined) throw new Error(`${at("bits")} must be one of ${FLOAT_BITS.join(", ")}.`);
  return floatType(width, name);
}

export function parseProjectConfig(value: unknown): ProjectConfig {
  const root = asRecord(value, PROJECT_CONFIG_FILE);
  assertKnownKeys(root, ["schema", "input", "verbose", "types"], PROJECT_CONFIG_FILE);

  if (root.schema !== 1) {
    throw new Error(`Unsupported ${PROJECT_CONFIG_FILE} schema.`);
  }

  return {
    schema: 1,
    input: asString(root.input, `${PROJECT_CONFIG_FILE}: 'input'`),
    verbose: root.verbose === undefined ? false : asBoolean(root.verbose, `${PROJECT_CONFIG_FILE}: 'verbose'`),
    types:
      root.types === undefined
        ? []
        : asArray(root.types, `${PROJECT_CONFIG_FILE}: 'types'`).map((entry, index) => parseExtraType(entry, index)),
  };
}

function readJson(path: string): unknown {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return raw;
}

/** Nearest directory at or above `fromDir` holding a project config, if any. */
export function findProjectRoot(fromDir: string): string | undefined {
  let cur = resolve(fromDir);
  while (true) {
    if (existsSync(join(cur, PROJECT_CONFIG_FILE))) return cur;
    const parent = dirname(cur);
    if (parent === cur) return undefined;
    cur = parent;
  }
}

export function loadProjectConfig(path: string): ProjectConfig {
  return parseProjectConfig(readJson(path));
}

/** Project context of the nearest `vgpu.json` at or above `fromDir`, if there is one. */
export function findProjectContext(fromDir: string): ProjectContext | undefined {
  const projectRoot = findProjectRoot(fromDir);
  if (projectRoot === undefined) return undefined;
  return { projectRoot, project: loadProjectConfig(join(projectRoot, PROJECT_CONFIG_FILE)) };
}
