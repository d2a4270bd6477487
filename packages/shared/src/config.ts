/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;
  metricsPort: number;

  // LLM (visual analysis)
  openaiApiKey: string;
  llmModelVision: string;
  llmRequestTimeoutMs: number;
  visionMaxConcurrent: number;
  visionRateLimitMax: number;
  visionRateLimitDurationMs: number;

  // Pipeline
  documentTimeoutMs: number;
  visualEnhancementMode: boolean;
  batchConcurrency: number;

  // Validation bounds (currency units)
  amountToleranceAbsolute: number;
  amountToleranceRelative: number;
  grossPayMin: number;
  grossPayMax: number;
  hourlyRateMin: number;
  hourlyRateMax: number;
  annualIncomeMin: number;
  annualIncomeMax: number;
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '4', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),
  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),

  // LLM (visual analysis)
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  llmModelVision: process.env.LLM_MODEL_VISION || 'gpt-4o',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  visionMaxConcurrent: parseInt(process.env.VISION_MAX_CONCURRENT || '2', 10),
  visionRateLimitMax: parseInt(process.env.VISION_RATE_LIMIT_MAX || '30', 10),
  visionRateLimitDurationMs: parseInt(process.env.VISION_RATE_LIMIT_DURATION_MS || '60000', 10),

  // Pipeline
  documentTimeoutMs: parseInt(process.env.DOCUMENT_TIMEOUT_MS || '120000', 10),
  visualEnhancementMode: process.env.VISUAL_ENHANCEMENT_MODE === 'true',
  batchConcurrency: parseInt(process.env.BATCH_CONCURRENCY || '4', 10),

  // Validation bounds
  amountToleranceAbsolute: parseFloat(process.env.AMOUNT_TOLERANCE_ABSOLUTE || '1.00'),
  amountToleranceRelative: parseFloat(process.env.AMOUNT_TOLERANCE_RELATIVE || '0.005'),
  grossPayMin: parseFloat(process.env.GROSS_PAY_MIN || '100'),
  grossPayMax: parseFloat(process.env.GROSS_PAY_MAX || '50000'),
  hourlyRateMin: parseFloat(process.env.HOURLY_RATE_MIN || '7.25'),
  hourlyRateMax: parseFloat(process.env.HOURLY_RATE_MAX || '1000'),
  annualIncomeMin: parseFloat(process.env.ANNUAL_INCOME_MIN || '1000'),
  annualIncomeMax: parseFloat(process.env.ANNUAL_INCOME_MAX || '5000000'),
};
