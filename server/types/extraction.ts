import type { CallEntities, CallIntent, DialogueState, EntityKey, ExtractedIntent, InquiryTopic } from "./call-state";

/**
 * Compact summary handed to the extractor each turn. Never the transcript:
 * just enough to interpret a short reply ("Tuesday", "yes", "Jamie").
 */
export interface ExtractionContext {
  dialogueState: DialogueState;
  intent: CallIntent | null;
  known: CallEntities;
  /** Entity the last prompt asked for, or "confirmation" for a yes/no question */
  awaiting?: EntityKey | "confirmation";
  /** Clinic-local date, YYYY-MM-DD */
  today: string;
  timezone: string;
}

export type ExtractionSource = "llm" | "keyword";

/** What a strategy produces */
export interface ExtractionCore {
  intent: ExtractedIntent;
  entities: CallEntities;
  /** 0..1 */
  confidence: number;
}

/** What the controller consumes: strategy output plus deterministic signals */
export interface Extraction extends ExtractionCore {
  confirmation?: "yes" | "no";
  startOver: boolean;
  inquiryTopic?: InquiryTopic;
  /** A date was spoken but it resolves to the past */
  mentionedPastDate: boolean;
  source: ExtractionSource;
}

/** One way of turning an utterance into an ExtractionCore */
export interface ExtractionStrategy {
  readonly source: ExtractionSource;
  run(utterance: string, context: ExtractionContext, signal?: AbortSignal): Promise<ExtractionCore>;
}
