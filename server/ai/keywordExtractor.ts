/**
 * Keyword Extractor
 *
 * Deterministic intent/entity extraction from a transcript. Used whenever the
 * language model is unavailable, slow or returns something unusable, so it
 * must be total: any string in, an ExtractionCore out, no exceptions.
 */

import type { ClinicConfig, ServiceType } from '@shared/schema';
import type { CallEntities, ExtractedIntent, InquiryTopic } from '../types/call-state';
import type { ExtractionContext, ExtractionCore } from '../types/extraction';
import { findDoctorByName, normalizeDoctorName } from '../services/clinicConfig';
import {
  extractExactTime,
  extractTimeOfDay,
  resolveDateExpression,
} from '../utils/date-parser';
import { formatName, looksLikeName } from '../utils/speech-helpers';
import { atClinicTime } from '../time';

export const MAX_UTTERANCE_LENGTH = 500;

function emptyResult(): ExtractionCore {
  return { intent: 'unknown', entities: {}, confidence: 0 };
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsTerm(text: string, term: string): boolean {
  const pattern = escapeRegex(term.toLowerCase()).replace(/\s+/g, '\\s+');
  return new RegExp(`\\b${pattern}(?:s|es)?\\b`).test(text);
}

/**
 * Normalize a transcript for matching: lowercase, collapse whitespace,
 * drop punctuation that speech-to-text sprinkles in (keeps : - ' for times, ids, names)
 */
export function normalizeUtterance(utterance: string): string {
  return utterance
    .slice(0, MAX_UTTERANCE_LENGTH)
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s:'+.-]/gu, ' ')
    .replace(/\.(?=\s|$)/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// ---------------------------------------------------------------------------
// Intent
// ---------------------------------------------------------------------------

const RESCHEDULE_PATTERNS = [
  /\bre-?schedul/,
  /\b(move|change|shift|push back|switch)\b.*\b(appointment|booking|visit|time)\b/,
  /\bdifferent (day|time)\b.*\b(appointment|booking)\b/,
];

const CANCEL_PATTERNS = [
  /\bcancel/,
  /\bcall off\b/,
  /\b(can'?t|cannot|won'?t be able to) make (it|my appointment)\b/,
];

const SCHEDULE_PATTERNS = [
  /\bbook/,
  /\bschedul/,
  /\b(make|set up|get|need|want|like) an? (\w+ )?appointment\b/,
  /\bnew appointment\b/,
  /\b(come in|get in|be seen|see (a|the|dr|doctor))\b/,
  /\bavailab(le|ility)\b/,
  /\bopenings?\b.*\b(for|on|this|next)\b/,
];

const INQUIRY_TOPICS: Array<{ topic: InquiryTopic; patterns: RegExp[] }> = [
  { topic: 'hours', patterns: [/\bhours\b/, /\b(what time|when) (do|are) you (open|close)\b/, /\bare you open\b/, /\bopening times?\b/] },
  { topic: 'locations', patterns: [/\bwhere\b/, /\baddress\b/, /\blocated\b/, /\blocations\b/, /\bdirections\b/] },
  { topic: 'services', patterns: [/\bwhat (services|treatments)\b/, /\bwhat do you (offer|do)\b/, /\bservices\b/] },
  { topic: 'doctors', patterns: [/\bwhich doctors\b/, /\bwho (works|are the doctors)\b/, /\bdoctors\b/, /\bpractitioners\b/] },
];

export function detectInquiryTopic(text: string): InquiryTopic | undefined {
  const normalized = normalizeUtterance(text);
  return INQUIRY_TOPICS.find(({ patterns }) => patterns.some((p) => p.test(normalized)))?.topic;
}

export function detectIntent(text: string): ExtractedIntent {
  const normalized = normalizeUtterance(text);
  if (RESCHEDULE_PATTERNS.some((p) => p.test(normalized))) return 'reschedule';
  if (CANCEL_PATTERNS.some((p) => p.test(normalized))) return 'cancel';
  if (SCHEDULE_PATTERNS.some((p) => p.test(normalized))) return 'schedule';
  if (detectInquiryTopic(normalized)) return 'inquiry';
  return 'unknown';
}

// ---------------------------------------------------------------------------
// Vocabulary matching
// ---------------------------------------------------------------------------

/**
 * Best service match by longest term: type, label, then configured synonyms
 */
export function matchService(config: ClinicConfig, text: string): ServiceType | undefined {
  const normalized = normalizeUtterance(text);
  let best: { type: ServiceType; length: number } | undefined;
  for (const service of config.services) {
    for (const term of [service.type, service.label, ...service.synonyms]) {
      if (containsTerm(normalized, term) && (!best || term.length > best.length)) {
        best = { type: service.type, length: term.length };
      }
    }
  }
  return best?.type;
}

/**
 * Location id whose name, alias or id is mentioned (longest term wins)
 */
export function matchLocation(config: ClinicConfig, text: string): string | undefined {
  const normalized = normalizeUtterance(text).replace(/_/g, ' ');
  let best: { id: string; length: number } | undefined;
  for (const location of config.locations) {
    for (const term of [location.name, location.id.replace(/_/g, ' '), ...location.aliases]) {
      if (containsTerm(normalized, term) && (!best || term.length > best.length)) {
        best = { id: location.id, length: term.length };
      }
    }
  }
  return best?.id;
}

const DOCTOR_STOPWORDS = new Set([
  'is', 'who', 'please', 'that', 'available', 'at', 'on', 'for', 'in', 'any', 'and', 'the', 'a', 'an',
  'i', 'would', 'will', 'there', 'you', 'to', 'appointment', 'visit', 'today', 'tomorrow', 'next', 'this',
  'or', 'with', 'office', 'about',
]);

/**
 * Doctor mentioned in the text. Configured doctors come back with their
 * display name; an unrecognized "Dr. Smith" is kept as spoken so the caller
 * can be told that name isn't one of ours.
 */
export function matchDoctor(config: ClinicConfig, text: string): string | undefined {
  const normalized = normalizeUtterance(text);

  for (const doctor of config.doctors) {
    const fullName = normalizeDoctorName(doctor.name);
    if (containsTerm(normalized, fullName)) return doctor.name;
  }

  const titled = normalized.match(/\b(?:dr|doctor)\.?\s+([\p{L}'-]+)(?:\s+([\p{L}'-]+))?/u);
  const withName = normalized.match(/\bwith\s+([\p{L}'-]+)(?:\s+([\p{L}'-]+))?/u);

  for (const match of [titled, withName]) {
    if (!match || DOCTOR_STOPWORDS.has(match[1])) continue;
    const candidates = match[2] && !DOCTOR_STOPWORDS.has(match[2]) ? [`${match[1]} ${match[2]}`, match[1]] : [match[1]];
    for (const candidate of candidates) {
      const doctor = findDoctorByName(config, candidate);
      if (doctor) return doctor.name;
    }
    // Only a titled mention is trusted as a doctor name we don't know
    if (match === titled) return `Dr. ${formatName(match[1])}`;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Patient details
// ---------------------------------------------------------------------------

const NAME_STOPWORDS = new Set([
  'and', 'i', 'i\'d', 'id', 'calling', 'looking', 'trying', 'wanting', 'hoping', 'wondering', 'interested',
  'here', 'just', 'a', 'an', 'the', 'new', 'free', 'available', 'not', 'sorry', 'good', 'fine', 'well',
  'going', 'after', 'also', 'so', 'really', 'actually', 'sure', 'for', 'to', 'about', 'from', 'with',
  'on', 'at', 'in', 'my', 'booking', 'phone', 'number', 'please', 'thanks', 'thank', 'who', 'would',
  'need', 'want', 'like', 'can', 'could', 'patient', 'your', 'yes', 'no', 'ok', 'okay',
  'great', 'perfect', 'correct', 'right', 'wrong', 'it', 'what', 'that', 'under', 'booked',
]);

function nameFromWords(words: string[]): string | undefined {
  const kept: string[] = [];
  for (const word of words) {
    if (NAME_STOPWORDS.has(word)) break;
    kept.push(word);
    if (kept.length === 3) break;
  }
  const candidate = kept.join(' ');
  return candidate && looksLikeName(candidate) ? formatName(candidate) : undefined;
}

/**
 * Patient name from "my name is …", "this is …", or (only when a name was
 * just asked for) "I'm …" and a bare-name reply
 */
export function extractPatientName(text: string, expectingName: boolean): string | undefined {
  const normalized = normalizeUtterance(text);

  const explicit = normalized.match(/\b(?:my name is|my name's|name is|the name is|this is|it's for|under the name|it's under|booked under)\s+(.+)$/);
  if (explicit) {
    const name = nameFromWords(explicit[1].split(' '));
    if (name) return name;
  }

  if (!expectingName) return undefined;

  const selfIntro = normalized.match(/\b(?:i'm|i am|it's|its)\s+(.+)$/);
  if (selfIntro) {
    const name = nameFromWords(selfIntro[1].split(' '));
    if (name) return name;
  }

  return looksLikeName(normalized) ? formatName(normalized) : undefined;
}

/**
 * Phone number with at least ten digits, digits only (keeps a leading +)
 */
export function extractPhone(text: string): string | undefined {
  const match = text.match(/\+?\d[\d\s().-]{8,}\d/);
  if (!match) return undefined;
  const digits = match[0].replace(/[^\d+]/g, '');
  const count = digits.replace(/\+/g, '').length;
  return count >= 10 && count <= 15 ? digits : undefined;
}

/**
 * Appointment confirmation number: "APT-1001", "a p t 1001",
 * "confirmation number 1001", or a bare number when one was just asked for
 */
export function extractAppointmentRef(text: string, expectingRef: boolean): string | undefined {
  const normalized = normalizeUtterance(text);
  const patterns = [
    /\ba\s*p\s*t[\s-]*(?:number\s*)?(\d{3,6})\b/,
    /\b(?:confirmation|reference|booking|appointment)\s+(?:number|code|id)?\s*(?:is\s+)?(?:apt[\s-]*)?(\d{3,6})\b/,
  ];
  for (const pattern of patterns) {
    const match = normalized.match(pattern);
    if (match) return `APT-${match[1]}`;
  }
  if (expectingRef) {
    const bare = normalized.match(/^(?:it'?s\s+|its\s+)?(\d{3,6})$/);
    if (bare) return `APT-${bare[1]}`;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export function extractByKeywords(
  utterance: string,
  context: ExtractionContext,
  config: ClinicConfig
): ExtractionCore {
  try {
    const text = normalizeUtterance(utterance);
    if (!text) return emptyResult();

    const today = atClinicTime(context.today, '00:00', context.timezone);
    const entities: CallEntities = {};

    const service = matchService(config, text);
    if (service) entities.service = service;

    const location = matchLocation(config, text);
    if (location) entities.location = location;

    if (/\b(any ?(doctor|one|body|practitioner)|anyone|anybody|no preference|whoever|whichever|doesn'?t matter who|don'?t mind who)\b/.test(text)) {
      entities.anyDoctor = true;
    } else {
      const doctorName = matchDoctor(config, text);
      if (doctorName) entities.doctorName = doctorName;
    }

    if (/\b(earliest|soonest|as soon as possible|asap|first available|next available)\b/.test(text)) {
      entities.earliestAvailable = true;
    }

    const requestedDate = resolveDateExpression(text, today);
    if (requestedDate) entities.requestedDate = requestedDate;

    const timeOfDay = extractTimeOfDay(text);
    if (timeOfDay) entities.timeOfDay = timeOfDay;

    const exactTime = extractExactTime(text);
    if (exactTime) entities.exactTime = exactTime;

    const patientName = extractPatientName(
      utterance.slice(0, MAX_UTTERANCE_LENGTH),
      context.awaiting === 'patientName' || context.awaiting === 'appointmentRef'
    );
    if (patientName) entities.patientName = patientName;

    const phone = extractPhone(text);
    if (phone) entities.patientPhone = phone;

    const appointmentRef = extractAppointmentRef(text, context.awaiting === 'appointmentRef');
    if (appointmentRef) entities.appointmentRef = appointmentRef;

    const intent = detectIntent(text);
    const found = Object.keys(entities).length;
    if (intent === 'unknown' && found === 0) return emptyResult();

    return {
      intent,
      entities,
      confidence: intent === 'unknown' ? 0.4 : 0.6,
    };
  } catch (error) {
    console.error('[Extractor] keyword extraction error, returning empty result:', error);
    return emptyResult();
  }
}
