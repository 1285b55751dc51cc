/**
 * LLM Extractor - language-model strategy for intent/entity extraction
 *
 * Sends the utterance plus a compact context summary, expects strict JSON,
 * validates it with zod and maps every value onto the clinic's vocabularies.
 * Throws ExtractionFailure on anything unusable; the guard in extractor.ts
 * falls back to keywords.
 */

import dayjs from 'dayjs';
import { z } from 'zod';
import { patientInfoSchema, TIMES_OF_DAY, type ClinicConfig } from '@shared/schema';
import type { CallEntities } from '../types/call-state';
import type { ExtractionContext, ExtractionCore, ExtractionStrategy } from '../types/extraction';
import { ExtractionFailure } from '../errors';
import { findDoctorByName } from '../services/clinicConfig';
import { speakDay } from '../time';
import type { LanguageModelBackend, LLMMessage } from './llmProvider';
import {
  extractAppointmentRef,
  matchLocation,
  matchService,
  MAX_UTTERANCE_LENGTH,
} from './keywordExtractor';

const nullableString = z.string().nullish();

const llmOutputSchema = z.object({
  intent: z.enum(['schedule', 'reschedule', 'cancel', 'inquiry', 'unknown']),
  confidence: z.number().min(0).max(1).optional(),
  entities: z
    .object({
      service: nullableString,
      location: nullableString,
      doctor_name: nullableString,
      requested_date: nullableString,
      time_of_day: nullableString,
      exact_time: nullableString,
      patient_name: nullableString,
      patient_phone: nullableString,
      appointment_ref: nullableString,
      any_doctor: z.boolean().nullish(),
      earliest_available: z.boolean().nullish(),
    })
    .default({}),
});

type LLMOutput = z.infer<typeof llmOutputSchema>;

function buildSystemPrompt(config: ClinicConfig, context: ExtractionContext): string {
  const services = config.services.map((s) => `${s.type} (${[s.label, ...s.synonyms].join(', ')})`).join('; ');
  const locations = config.locations.map((l) => `${l.id} (${[l.name, ...l.aliases].join(', ')})`).join('; ');
  const doctors = config.doctors.map((d) => d.name).join(', ');

  return `You extract structured data for ${config.clinicName}'s phone booking line.
Today is ${context.today} (${speakDay(context.today, context.timezone)}), time zone ${context.timezone}.
Resolve relative dates ("this Friday", "next Tuesday") to the nearest FUTURE date. Never return a past date.

Vocabularies (use the id before the parentheses):
- services: ${services}
- locations: ${locations}
- doctors: ${doctors}

Return STRICT JSON only, no prose:
{
  "intent": "schedule" | "reschedule" | "cancel" | "inquiry" | "unknown",
  "confidence": 0.0-1.0,
  "entities": {
    "service": service id or null,
    "location": location id or null,
    "doctor_name": doctor name as listed, or as spoken if not listed, or null,
    "requested_date": "YYYY-MM-DD" or null,
    "time_of_day": "morning" | "afternoon" | "evening" or null,
    "exact_time": "HH:mm" 24-hour or null,
    "patient_name": string or null,
    "patient_phone": digits or null,
    "appointment_ref": confirmation number like "APT-1001" or null,
    "any_doctor": true if the caller has no doctor preference, else null,
    "earliest_available": true if the caller wants the soonest opening, else null
  }
}
Only include values the caller actually said in this utterance.`;
}

function buildContextSummary(context: ExtractionContext): string {
  return JSON.stringify({
    state: context.dialogueState,
    intent: context.intent,
    known: context.known,
    awaiting: context.awaiting ?? null,
  });
}

/**
 * Map raw model values onto the clinic's vocabularies; drop anything that doesn't fit
 */
export function mapLLMEntities(
  raw: LLMOutput['entities'],
  config: ClinicConfig,
  context: ExtractionContext
): CallEntities {
  const entities: CallEntities = {};

  if (raw.service) {
    const service = config.services.find((s) => s.type === raw.service)?.type ?? matchService(config, raw.service);
    if (service) entities.service = service;
  }

  if (raw.location) {
    const location = config.locations.find((l) => l.id === raw.location)?.id ?? matchLocation(config, raw.location);
    if (location) entities.location = location;
  }

  if (raw.doctor_name) {
    entities.doctorName = findDoctorByName(config, raw.doctor_name)?.name ?? raw.doctor_name.trim();
  }

  if (
    raw.requested_date &&
    dayjs(raw.requested_date, 'YYYY-MM-DD', true).isValid() &&
    raw.requested_date >= context.today
  ) {
    entities.requestedDate = raw.requested_date;
  }

  const timeOfDay = TIMES_OF_DAY.find((t) => t === raw.time_of_day);
  if (timeOfDay) entities.timeOfDay = timeOfDay;

  if (raw.exact_time && /^([01]\d|2[0-3]):[0-5]\d$/.test(raw.exact_time)) {
    entities.exactTime = raw.exact_time;
  }

  if (raw.patient_name) {
    const name = patientInfoSchema.shape.name.safeParse(raw.patient_name);
    if (name.success) entities.patientName = name.data;
  }

  if (raw.patient_phone) {
    const phone = patientInfoSchema.shape.phone.safeParse(raw.patient_phone);
    if (phone.success && phone.data) entities.patientPhone = phone.data;
  }

  if (raw.appointment_ref) {
    const ref = extractAppointmentRef(raw.appointment_ref, true);
    if (ref) entities.appointmentRef = ref;
  }

  if (raw.any_doctor) entities.anyDoctor = true;
  if (raw.earliest_available) entities.earliestAvailable = true;

  return entities;
}

export class LanguageModelStrategy implements ExtractionStrategy {
  readonly source = 'llm' as const;

  constructor(
    private readonly backend: LanguageModelBackend,
    private readonly config: ClinicConfig
  ) {}

  async run(utterance: string, context: ExtractionContext, signal?: AbortSignal): Promise<ExtractionCore> {
    const messages: LLMMessage[] = [
      { role: 'system', content: buildSystemPrompt(this.config, context) },
      {
        role: 'user',
        content: `Context: ${buildContextSummary(context)}\nCaller said: "${utterance.slice(0, MAX_UTTERANCE_LENGTH)}"`
      }
    ];

    const content = await this.backend.complete(messages, {
      signal,
      temperature: 0,
      maxTokens: 300,
      json: true
    });

    const jsonMatch = content.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
      throw new ExtractionFailure('malformed', 'No JSON found in LLM response');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(jsonMatch[0]);
    } catch (error) {
      throw new ExtractionFailure('malformed', 'LLM response is not valid JSON', { cause: error });
    }

    const parsed = llmOutputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExtractionFailure(
        'malformed',
        `LLM response failed validation: ${parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ')}`
      );
    }

    return {
      intent: parsed.data.intent,
      entities: mapLLMEntities(parsed.data.entities, this.config, context),
      confidence: parsed.data.confidence ?? 0.9
    };
  }
}
