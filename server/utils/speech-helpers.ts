/**
 * Speech Recognition Helpers
 *
 * Central utilities for interpreting spoken responses in voice calls.
 * These handle variations in how people say yes/no/start over, and
 * whether a short reply is plausibly a person's name.
 */

const START_OVER_PATTERNS = [
  /\bstart\s+(over|again)\b/,
  /\bbegin\s+again\b/,
  /\bfrom\s+the\s+(top|beginning)\b/,
  /\bscratch\s+that\b/,
  /\breset\b/
];

// Words that show up in short replies but are never a name
const NON_NAME_WORDS = new Set([
  'yes', 'yeah', 'yep', 'no', 'nope', 'ok', 'okay', 'sure', 'hello', 'hi', 'hey', 'thanks', 'thank',
  'today', 'tomorrow', 'morning', 'afternoon', 'evening', 'tonight', 'noon',
  'sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday',
  'next', 'this', 'week', 'day', 'days', 'at', 'in', 'on', 'the', 'a', 'an', 'and', 'or',
  'appointment', 'book', 'booking', 'schedule', 'reschedule', 'cancel', 'change', 'move',
  'chiropractic', 'chiropractor', 'adjustment', 'acupuncture', 'massage', 'consultation', 'consult',
  'doctor', 'dr', 'please', 'any', 'anyone', 'earliest', 'soon', 'available', 'time',
  'january', 'february', 'march', 'april', 'may', 'june', 'july', 'august',
  'september', 'october', 'november', 'december', 'am', 'pm'
]);

/**
 * Determine if speech is a clear yes/no response with NO-wins precedence.
 * "yeah no", "absolutely not" and "that doesn't work" are all NO.
 */
export function classifyYesNo(speech: string): 'yes' | 'no' | 'unclear' {
  if (!speech) return 'unclear';

  const normalized = speech
    .toLowerCase()
    .trim()
    .replace(/[.,!?;:"]/g, ' ')
    .replace(/\s+/g, ' ');

  const noPhrases = [
    /\babsolutely\s+not?\b/,
    /\bdefinitely\s+not\b/,
    /\bdon'?t\s+think\s+so\b/,
    /\bdoesn'?t\s+work\b/,
    /\bcan'?t\s+(make|do)\s+(it|that)\b/,
    /\bnot\s+(that|then|good|right)\b/,
    /\bsomething\s+else\b/
  ];
  if (noPhrases.some(pattern => pattern.test(normalized))) {
    return 'no';
  }

  const noTokens = [
    /\bno\b/,
    /\bnope\b/,
    /\bnah\b/,
    /\bnegative\b/,
    /\bwrong\b/,
    /\bincorrect\b/,
    /\bnot\b/
  ];

  const yesPatterns = [
    /\byes\b/,
    /\byeah\b/,
    /\byep\b/,
    /\byup\b/,
    /\bcorrect\b/,
    /\bsure\b/,
    /\babsolutely\b/,
    /\bdefinitely\b/,
    /\bperfect\b/,
    /\bok\b/,
    /\bokay\b/,
    /\bthat'?s\s+(right|fine|great)\b/,
    /\bsounds\s+(good|great)\b/,
    /\b(that|it)\s+works\b/,
    /\bbook\s+it\b/,
    /\bgo\s+ahead\b/,
    /\bplease\s+do\b/
  ];

  // "no problem" / "no worries" are not a decline
  const withoutIdioms = normalized.replace(/\bno\s+(problem|problems|worries)\b/g, ' ');

  // NO wins precedence
  if (noTokens.some(pattern => pattern.test(withoutIdioms))) {
    return 'no';
  }
  if (yesPatterns.some(pattern => pattern.test(normalized))) {
    return 'yes';
  }
  return 'unclear';
}

/**
 * Check if the caller wants to abandon the current request and begin again
 */
export function wantsToStartOver(speech: string): boolean {
  if (!speech) return false;
  const text = speech.toLowerCase();
  return START_OVER_PATTERNS.some(pattern => pattern.test(text));
}

/**
 * Heuristic for a bare-name reply ("Jamie Rivera"): one to four words,
 * letters only, none of them date, time or booking vocabulary.
 */
export function looksLikeName(speech: string): boolean {
  const text = speech.trim().replace(/[.,!?]+$/g, '');
  if (text.length < 2 || text.length > 60) return false;
  if (!/^[\p{L}][\p{L} .'-]*$/u.test(text)) return false;

  const words = text.toLowerCase().split(/\s+/);
  if (words.length > 4) return false;
  return !words.some(word => NON_NAME_WORDS.has(word.replace(/\.$/, '')));
}

/**
 * Title-case a spoken name: "jamie o'neil" → "Jamie O'Neil"
 */
export function formatName(name: string): string {
  return name
    .trim()
    .split(/\s+/)
    .map(part => part.replace(/(^|['-])(\p{L})/gu, (_m, sep: string, ch: string) => sep + ch.toUpperCase()))
    .join(' ');
}
