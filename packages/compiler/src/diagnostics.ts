export type TranslationErrorKind =
  | "DuplicateRegisterDeclaration"
  | "UnresolvedRegister"
  | "UnresolvedGlobal"
  | "UnresolvedBasicBlock"
  | "UnresolvedArgument"
  | "UnsupportedInstruction"
  | "UnsupportedOperandAddressingMode"
  | "UnknownType";

const TRANSLATION_DIAGNOSTICS = {
  VIR1001: "DuplicateRegisterDeclaration",
  VIR1002: "UnresolvedRegister",
  VIR1003: "UnresolvedGlobal",
  VIR1004: "UnresolvedBasicBlock",
  VIR1005: "UnresolvedArgument",
  VIR2001: "UnsupportedInstruction",
  VIR2002: "UnsupportedInstruction",
  VIR2003: "UnsupportedInstruction",
  VIR2004: "UnsupportedOperandAddressingMode",
  VIR3001: "UnknownType",
} as const satisfies Record<string, TranslationErrorKind>;

export type TranslationDiagnosticCode = keyof typeof TRANSLATION_DIAGNOSTICS;

export type TranslationDiagnosticDomain = "symbols" | "lowering" | "types" | "other";

export const TRANSLATION_DIAGNOSTIC_CODES: readonly TranslationDiagnosticCode[] = Object.freeze(
  Object.keys(TRANSLATION_DIAGNOSTICS).filter(isTranslationDiagnosticCode)
);

export function isTranslationDiagnosticCode(code: string): code is TranslationDiagnosticCode {
  return Object.hasOwn(TRANSLATION_DIAGNOSTICS, code);
}

export function assertTranslationDiagnosticCode(code: string): asserts code is TranslationDiagnosticCode {
  if (!isTranslationDiagnosticCode(code)) {
    throw new Error(`Unknown translation diagnostic code '${code}'.`);
  }
}

export function translationDiagnosticKind(code: TranslationDiagnosticCode): TranslationErrorKind {
  return TRANSLATION_DIAGNOSTICS[code];
}

export function translationDiagnosticDomain(code: string): TranslationDiagnosticDomain {
  if (code.startsWith("VIR1")) return "symbols";
  if (code.startsWith("VIR2")) return "lowering";
  if (code.startsWith("VIR3")) return "types";
  return "other";
}
