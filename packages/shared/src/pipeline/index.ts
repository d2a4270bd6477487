/**
 * Extraction Pipeline
 */

export { FieldStore, isEmptyValue } from './field-store';
export { validate, contradictedFields } from './cross-validator';
export { scoreConfidence } from './confidence';
export { assemble, deepFreeze, type AssemblyInput } from './assembler';
export {
  FallbackOrchestrator,
  nextState,
  type OrchestratorState,
  type OrchestratorOptions,
  type OrchestrationResult,
} from './orchestrator';
export {
  DocumentParser,
  defaultParserOptions,
  type ParserDependencies,
  type ParserOptions,
} from './parser';
export { parseBatch, type BatchItemResult, type BatchOptions } from './batch';
