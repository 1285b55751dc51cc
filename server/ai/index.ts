/**
 * AI Module - intent/entity extraction for the phone booking line
 *
 * Usage:
 *   import { createExtractor, createBackendFromEnv } from './ai';
 */

// LLM Provider
export {
  OpenAIBackend,
  createBackendFromEnv,
  type LanguageModelBackend,
  type LLMMessage,
  type LLMOptions,
  type OpenAIBackendConfig
} from './llmProvider';

// Strategies
export { LanguageModelStrategy, mapLLMEntities } from './llmExtractor';
export {
  extractByKeywords,
  detectIntent,
  detectInquiryTopic,
  matchService,
  matchLocation,
  matchDoctor,
  MAX_UTTERANCE_LENGTH
} from './keywordExtractor';

// Guarded extractor
export {
  GuardedExtractor,
  KeywordStrategy,
  createExtractor,
  finalizeExtraction,
  type EntityExtractor,
  type GuardedExtractorOptions,
  type CreateExtractorOptions
} from './extractor';
