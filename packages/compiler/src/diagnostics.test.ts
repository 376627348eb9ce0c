import { expect } from "chai";
import { readFileSync, readdirSync, statSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import ts from "typescript";

import {
  assertTranslationDiagnosticCode,
  translationDiagnosticDomain,
  translationDiagnosticKind,
  TRANSLATION_DIAGNOSTIC_CODES,
} from "./diagnostics.js";

describe("@vgpu/compiler diagnostics registry", () => {
  function sourceRoot(): string {
    return dirname(fileURLToPath(import.meta.url));
  }

  function compilerSourceFiles(root = sourceRoot()): readonly string[] {
    const out: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of readdirSync(dir)) {
        const abs = join(dir, entry);
        if (statSync(abs).isDirectory()) {
          walk(abs);
          continue;
        }
        if (!abs.endsWith(".ts") || abs.endsWith(".test.ts")) continue;
        out.push(abs);
      }
    };
    walk(root);
    return out.sort((a, b) => a.localeCompare(b));
  }

  function usedCodes(): readonly string[] {
    const registry = join(sourceRoot(), "diagnostics.ts");
    const matches = new Set<string>();
    for (const file of compilerSourceFiles()) {
      if (file === registry) continue;
      for (const code of readFileSync(file, "utf-8").match(/\bVIR\d{4}\b/g) ?? []) {
        matches.add(code);
      }
    }
    return [...matches].sort((a, b) => a.localeCompare(b));
  }

  it("keeps diagnostic codes normalized and unique", () => {
    const values = [...TRANSLATION_DIAGNOSTIC_CODES];
    expect(new Set(values).size).to.equal(values.length);
    for (const code of values) {
      expect(code).to.match(/^VIR\d{4}$/);
    }
  });

  it("keeps diagnostic usage synchronized with the registry", () => {
    const fromRegistry = [...TRANSLATION_DIAGNOSTIC_CODES].sort((a, b) => a.localeCompare(b));
    expect(usedCodes()).to.deep.equal(fromRegistry);
  });

  it("rejects unknown diagnostic codes", () => {
    expect(() => assertTranslationDiagnosticCode("VIR9999")).to.throw("Unknown translation diagnostic code 'VIR9999'.");
  });

  it("maps codes to kinds and domains", () => {
    for (const code of TRANSLATION_DIAGNOSTIC_CODES) {
      expect(translationDiagnosticDomain(code)).to.not.equal("other");
    }
    expect(translationDiagnosticKind("VIR1002")).to.equal("UnresolvedRegister");
    expect(translationDiagnosticKind("VIR2004")).to.equal("UnsupportedOperandAddressingMode");
    expect(translationDiagnosticDomain("VIR3001")).to.equal("types");
    expect(translationDiagnosticDomain("XYZ0001")).to.equal("other");
  });

  it("keeps translation paths free of raw Error throws", () => {
    const offenders = compilerSourceFiles(join(sourceRoot(), "translation")).filter((file) =>
      readFileSync(file, "utf-8").includes("throw new Error(")
    );
    expect(offenders).to.deep.equal([]);
  });

  it("keeps direct fail(...) calls site-annotated", () => {
    const offenders: string[] = [];
    for (const file of compilerSourceFiles()) {
      const sf = ts.createSourceFile(file, readFileSync(file, "utf-8"), ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
      const walk = (node: ts.Node): void => {
        if (ts.isCallExpression(node) && ts.isIdentifier(node.expression) && node.expression.text === "fail") {
          if (node.arguments.length < 3) {
            const { line, character } = sf.getLineAndCharacterOfPosition(node.getStart(sf));
            offenders.push(`${file}:${line + 1}:${character + 1}`);
          }
        }
        ts.forEachChild(node, walk);
      };
      walk(sf);
    }
    expect(offenders).to.deep.equal([]);
  });
});
