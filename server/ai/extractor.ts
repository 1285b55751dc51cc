/**
 * Entity Extractor - one interface, two strategies
 *
 * The guard runs the language-model strategy when a backend is configured,
 * bounded by an AbortController timeout, and degrades to keyword matching on
 * any failure. Deterministic signals (yes/no, start over, inquiry topic) are
 * computed from the transcript the same way whichever strategy answered.
 */

import type { ClinicConfig } from '@shared/schema';
import type {
  Extraction,
  ExtractionContext,
  ExtractionCore,
  ExtractionSource,
  ExtractionStrategy,
} from '../types/extraction';
import { ExtractionFailure } from '../errors';
import { classifyYesNo, wantsToStartOver } from '../utils/speech-helpers';
import { mentionsDate } from '../utils/date-parser';
import type { LanguageModelBackend } from './llmProvider';
import { LanguageModelStrategy } from './llmExtractor';
import { detectInquiryTopic, extractByKeywords, MAX_UTTERANCE_LENGTH } from './keywordExtractor';

export interface EntityExtractor {
  extract(utterance: string, context: ExtractionContext): Promise<Extraction>;
}

export class KeywordStrategy implements ExtractionStrategy {
  readonly source = 'keyword' as const;

  constructor(private readonly config: ClinicConfig) {}

  async run(utterance: string, context: ExtractionContext): Promise<ExtractionCore> {
    return extractByKeywords(utterance, context, this.config);
  }
}

export interface GuardedExtractorOptions {
  primary?: ExtractionStrategy | null;
  fallback: ExtractionStrategy;
  timeoutMs: number;
}

function withTimeout<T>(work: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ExtractionFailure('timeout', `LLM extraction exceeded ${timeoutMs}ms`));
    }, timeoutMs);
  });

  return Promise.race([work(controller.signal), timeout]).finally(() => clearTimeout(timer));
}

/**
 * Add the deterministic signals to a strategy's output
 */
export function finalizeExtraction(
  core: ExtractionCore,
  utterance: string,
  context: ExtractionContext,
  source: ExtractionSource
): Extraction {
  const text = utterance.slice(0, MAX_UTTERANCE_LENGTH);
  const yesNo = classifyYesNo(text);
  const inquiryTopic = detectInquiryTopic(text);
  const { entities } = core;

  let intent = core.intent;
  if (intent === 'unknown' && inquiryTopic) {
    intent = 'inquiry';
  } else if (
    intent === 'unknown' &&
    context.intent === null &&
    (entities.service || entities.location || entities.requestedDate || entities.doctorName)
  ) {
    // "Massage on Friday" is a booking request even without the word "book"
    intent = 'schedule';
  }

  return {
    intent,
    entities,
    confidence: core.confidence,
    confirmation: yesNo === 'unclear' ? undefined : yesNo,
    startOver: wantsToStartOver(text),
    inquiryTopic: intent === 'inquiry' ? inquiryTopic : undefined,
    mentionedPastDate: !entities.requestedDate && mentionsDate(text),
    source,
  };
}

export class GuardedExtractor implements EntityExtractor {
  private readonly primary: ExtractionStrategy | null;
  private readonly fallback: ExtractionStrategy;
  private readonly timeoutMs: number;

  constructor(options: GuardedExtractorOptions) {
    this.primary = options.primary ?? null;
    this.fallback = options.fallback;
    this.timeoutMs = options.timeoutMs;
  }

  async extract(utterance: string, context: ExtractionContext): Promise<Extraction> {
    if (this.primary) {
      const primary = this.primary;
      const started = Date.now();
      try {
        const core = await withTimeout((signal) => primary.run(utterance, context, signal), this.timeoutMs);
        console.log(`[Extractor] ${primary.source} intent=${core.intent} in ${Date.now() - started}ms`);
        return finalizeExtraction(core, utterance, context, primary.source);
      } catch (error) {
        if (error instanceof ExtractionFailure) {
          console.warn(`[Extractor] ${primary.source} failed (${error.reason}): ${error.message}; using keywords`);
        } else {
          console.error(`[Extractor] ${primary.source} threw unexpectedly; using keywords`, error);
        }
      }
    }

    const core = await this.fallback.run(utterance, context);
    return finalizeExtraction(core, utterance, context, this.fallback.source);
  }
}

export interface CreateExtractorOptions {
  config: ClinicConfig;
  backend?: LanguageModelBackend | null;
  timeoutMs?: number;
}

/**
 * Wire the strategies: language model first when a backend exists, keywords always
 */
export function createExtractor({ config, backend, timeoutMs = 3000 }: CreateExtractorOptions): EntityExtractor {
  return new GuardedExtractor({
    primary: backend ? new LanguageModelStrategy(backend, config) : null,
    fallback: new KeywordStrategy(config),
    timeoutMs
  });
}
