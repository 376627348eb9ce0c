import {
  assertTranslationDiagnosticCode,
  translationDiagnosticKind,
  type TranslationDiagnosticCode,
  type TranslationErrorKind,
} from "../diagnostics.js";

/** Where a translation failure happened; empty outside of any kernel. */
export type TranslationSite = {
  readonly kernel?: string;
  readonly instruction?: string;
};

export class TranslationError extends Error {
  readonly code: TranslationDiagnosticCode;
  readonly kind: TranslationErrorKind;
  readonly site: TranslationSite;

  constructor(code: string, message: string, site: TranslationSite = {}) {
    assertTranslationDiagnosticCode(code);
    super(message);
    this.code = code;
    this.kind = translationDiagnosticKind(code);
    this.site = site;
    this.name = "TranslationError";
  }
}

export function fail(code: string, message: string, site: TranslationSite): never {
  throw new TranslationError(code, message, site);
}

export function formatTranslationError(error: TranslationError): string {
  const where = [
    error.site.kernel === undefined ? undefined : `kernel '${error.site.kernel}'`,
    error.site.instruction === undefined ? undefined : `at '${error.site.instruction}'`,
  ].filter((part): part is string => part !== undefined);
  const suffix = where.length === 0 ? "" : ` (${where.join(" ")})`;
  return `${error.code}: ${error.message}${suffix}`;
}
