export {
  processStatement,
  transcribePages,
  finalizeStatement,
  parseExtraction,
  parseExtractionText,
  isProcessingError,
  type StatementInput,
  type ProcessorOptions,
  type ProcessingOutcome,
  type ProcessingError,
  type FinalizedStatement,
} from './statement-processor.js';
export { withRetry, isRetryableError, calculateDelay, type RetryOptions } from './retry.js';
export { extractJsonBlock, parseInsights } from './json-block.js';
export { loadPromptTemplates, fillTemplate, DEFAULT_PROMPTS_DIR, type PromptTemplates } from './prompts.js';
export {
  GeminiStatementModel,
  DEFAULT_TEXT_MODEL,
  DEFAULT_VISION_MODEL,
  type GeminiModelOptions,
} from './gemini-model.js';
export { sampleStatementResult } from './sample.js';
export type { StatementModel } from './model.js';
export {
  TesseractOrientation,
  orientationToRotation,
  type OsdEngine,
  type WordEngine,
  type TesseractOrientationOptions,
} from './tesseract-orientation.js';
