#!/usr/bin/env -S node --import tsx
import { argv, cwd, exit } from "node:process";
import { pathToFileURL } from "node:url";

import { formatTranslationError, TranslationError } from "@vgpu/compiler";

import { runTranslate } from "./internal/commands/translate.js";

export type Cmd = "translate" | "help";

function usage(): void {
  console.log(
    [
      "vgpu v0",
      "",
      "Usage:",
      "  vgpu translate [--verbose] [file]",
      "  vgpu help",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (cmd === "translate") return cmd;
  return "help";
}

export function formatCliError(err: unknown): string {
  if (err instanceof TranslationError) return formatTranslationError(err);
  if (err instanceof Error) return err.message;
  return String(err);
}

function main(): void {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "translate":
        runTranslate({ dir: cwd(), argv: argv.slice(3) });
        return;
      default:
        usage();
        exit(argv[2] === "help" ? 0 : 1);
    }
  } catch (err: unknown) {
    console.error(formatCliError(err));
    exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main();
}
