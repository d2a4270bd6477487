/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  PipelineError,
  UnreadableDocumentError,
  MethodError,
  MethodFailureError,
  InvalidResponseError,
  ServiceUnavailableError,
  ServiceTimeoutError,
  ContractViolationError,
  errorMessage,
} from './errors';

// Money
export {
  isMoney,
  parseMoney,
  moneyToCents,
  centsToMoney,
  sumCents,
  applyRate,
  parseDecimal,
} from './money';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ParseDocumentJob,
  type ParseCompleteJob,
  getRedisConnection,
  createQueue,
  createWorker,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsParsedCounter,
  methodAttemptsCounter,
  parseDurationHistogram,
  visionRequestsCounter,
  visionRequestDurationHistogram,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas & wire format
export { isPaystubRecord, isW2Record, contractErrors, compileResponseValidator } from './schemas';
export { serializeRecord, parseRecord } from './wire';

// Visual templates
export {
  getTemplateForDocumentType,
  renderUserPrompt,
  PAYSTUB_TEMPLATE,
  W2_TEMPLATE,
  type ExtractionTemplate,
  type PromptValues,
  type PaystubVisionResponse,
  type W2VisionResponse,
} from './templates';

// Collaborator interfaces
export type {
  DocumentInput,
  PageImage,
  PageSet,
  BoundingBox,
  TableCell,
  DetectedTable,
  TableSet,
  PageText,
  DocumentSource,
  TextSource,
  VisualResponseSchema,
  VisualAnalysisRequest,
  VisualInferenceService,
} from './sources/types';
export { createRateLimitedVisualService } from './sources/rate-limited';

// Document profiles
export type {
  DocumentProfile,
  CrossCheck,
  ValidationOptions,
  ProcessingSignals,
  RubricCategory,
  RubricCriterion,
  RecordEnvelope,
} from './documents/types';
export { paystubProfile } from './documents/paystub';
export { w2Profile, calculateIncome } from './documents/w2';
export { normalizeDate, normalizePayFrequency, normalizeSsn, normalizeEin, parseAddress } from './documents/normalize';

// Extraction adapters
export {
  BaseAdapter,
  StructuredTableAdapter,
  RawTextAdapter,
  VisualAnalysisAdapter,
  createAdapters,
  type AdapterContext,
  type AdapterDiagnostics,
  type AdapterResult,
  type AttemptMode,
  type ExtractionAdapter,
} from './extractors';

// Pipeline
export {
  FieldStore,
  isEmptyValue,
  validate,
  contradictedFields,
  scoreConfidence,
  assemble,
  deepFreeze,
  FallbackOrchestrator,
  nextState,
  DocumentParser,
  defaultParserOptions,
  parseBatch,
  type OrchestratorState,
  type OrchestratorOptions,
  type OrchestrationResult,
  type ParserDependencies,
  type ParserOptions,
  type BatchItemResult,
  type BatchOptions,
} from './pipeline';
