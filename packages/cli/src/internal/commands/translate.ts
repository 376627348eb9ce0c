import { resolve } from "node:path";

import { CompilationContext, loadSourceModuleFile, translateSourceModule } from "@vgpu/compiler";
import type { IrFunction, Module } from "@vgpu/ir";

import { findProjectContext, PROJECT_CONFIG_FILE } from "../config.js";

export type TranslateArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
  /** Summary lines; defaults to stdout. */
  readonly out?: (line: string) => void;
  /** Verbose translation log; defaults to stderr. */
  readonly err?: (line: string) => void;
};

export type TranslateParsed = {
  readonly file?: string;
  readonly verbose: boolean;
};

export function parseTranslateArgs(args: Pick<TranslateArgs, "dir" | "argv">): TranslateParsed {
  let file: string | undefined;
  let verbose = false;

  for (const a of args.argv) {
    switch (a) {
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--help":
      case "-h":
        throw new Error("Usage: vgpu translate [--verbose] [file]");
      default:
        if (a.startsWith("-")) throw new Error(`translate: unknown arg: ${a}`);
        if (file !== undefined) throw new Error(`translate: unexpected extra input: ${a}`);
        file = resolve(args.dir, a);
    }
  }
  return file === undefined ? { verbose } : { file, verbose };
}

export function summarizeFunction(fn: IrFunction): string {
  const instructions = fn.blocks.reduce((count, block) => count + block.instructions.length, 0);
  return `${fn.name} (${fn.linkage}): ${fn.blocks.length} blocks, ${fn.registers.length} registers, ${instructions} instructions`;
}

/**
 * Translates the input named on the command line, or the project's `input`,
 * and prints one summary line per translated function.
 */
export function runTranslate(args: TranslateArgs): Module {
  const parsed = parseTranslateArgs(args);
  const project = findProjectContext(args.dir);

  let input = parsed.file;
  if (input === undefined) {
    if (!project) {
      throw new Error(`translate: no input file given and no ${PROJECT_CONFIG_FILE} found.`);
    }
    input = resolve(project.projectRoot, project.project.input);
  }

  const out = args.out ?? ((line: string) => console.log(line));
  const err = args.err ?? ((line: string) => console.error(line));
  const verbose = parsed.verbose || (project?.project.verbose ?? false);

  const context = new CompilationContext(project?.project.types ?? []);
  const module = translateSourceModule(context, loadSourceModuleFile(input), verbose ? err : undefined);
  for (const fn of module.functions) {
    out(summarizeFunction(fn));
  }
  return module;
}
