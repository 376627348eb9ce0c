export { CompilationContext } from "./context.js";
export type { TranslationDiagnosticCode, TranslationDiagnosticDomain, TranslationErrorKind } from "./diagnostics.js";
export {
  assertTranslationDiagnosticCode,
  isTranslationDiagnosticCode,
  TRANSLATION_DIAGNOSTIC_CODES,
  translationDiagnosticDomain,
  translationDiagnosticKind,
} from "./diagnostics.js";
export { asArray, asBoolean, asEnum, asInteger, asRecord, asString, assertKnownKeys } from "./json-fields.js";
export type {
  SourceAddressSpace,
  SourceAddressingMode,
  SourceAtomicOperation,
  SourceAttribute,
  SourceBlock,
  SourceCfg,
  SourceComparison,
  SourceDataType,
  SourceGlobal,
  SourceInstruction,
  SourceKernel,
  SourceMemoryLevel,
  SourceModifier,
  SourceModule,
  SourceOpcode,
  SourceOperand,
  SourceParameter,
  SourcePredicate,
  SourceRegister,
  SourceRegisterId,
  SourceSpecialRegister,
  SourceVectorLane,
} from "./source/isa.js";
export {
  createSourceCfg,
  dataTypeBytes,
  isFloatType,
  isSignedType,
  sourceInstructionToString,
  sourceOperandToString,
  targetTypeName,
} from "./source/isa.js";
export { loadSourceModuleFile, parseSourceModuleJson } from "./source/json.js";
export type { TranslationSite } from "./translation/errors.js";
export { formatTranslationError, TranslationError } from "./translation/errors.js";
export { selectBinaryOpcode, selectComparison, selectConversionOpcode } from "./translation/opcode-selection.js";
export type { TranslateOptions } from "./translation/translator.js";
export { translateModule, translateSourceModule } from "./translation/translator.js";
