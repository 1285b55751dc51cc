/**
 * TwiML Helper
 * Turns controller responses into TwiML for the Twilio voice webhook
 */

import twilio from 'twilio';
import type VoiceResponse from 'twilio/lib/twiml/VoiceResponse';
import type { TurnResponse } from '../types/call-state';

// Twilio keeps its voice union private; read it off the exported <Say> attributes
type SayVoice = NonNullable<VoiceResponse.SayAttributes['voice']>;

export const SUPPORTED_VOICES = [
  'Polly.Joanna-Neural',
  'Polly.Matthew-Neural',
  'Polly.Salli-Neural',
  'alice',
] as const satisfies readonly SayVoice[];

export type SupportedVoice = (typeof SUPPORTED_VOICES)[number];

const FALLBACK_VOICE: SupportedVoice = 'alice';

// Spoken prompts get cut off past this length by the TTS provider
const MAX_SAY_LENGTH = 3000;

/**
 * Removes characters that make Twilio reject a <Say> (error 13520)
 */
export function ttsClean(text?: string): string {
  if (!text) return '';
  return String(text)
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/[–—]/g, '-')
    .replace(/[…]/g, '...')
    .replace(/[^\x00-\x7F]/g, '')
    .replace(/[\x00-\x1F\x7F]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_SAY_LENGTH);
}

/**
 * Get TwiML XML string from VoiceResponse.
 * Always returns valid TwiML, even if rendering throws.
 */
export function getTwimlXml(vr: VoiceResponse): string {
  try {
    return vr.toString();
  } catch (error) {
    console.error('[getTwimlXml] Error generating TwiML, returning fallback:', error);
    const fallbackVr = new twilio.twiml.VoiceResponse();
    fallbackVr.say({ voice: FALLBACK_VOICE }, 'Sorry, there was a problem. Please try again.');
    fallbackVr.hangup();
    return fallbackVr.toString();
  }
}

export interface TurnTwimlOptions {
  voice: SupportedVoice;
  /** Where Twilio posts the next SpeechResult */
  actionUrl: string;
  timeoutSeconds?: number;
}

/**
 * Speak the prompt and either gather the next utterance (or keyed digits) or hang up
 */
export function renderTurnTwiml(response: TurnResponse, options: TurnTwimlOptions): string {
  const vr = new twilio.twiml.VoiceResponse();
  const prompt = ttsClean(response.prompt);

  if (response.shouldEndCall) {
    if (prompt) vr.say({ voice: options.voice }, prompt);
    vr.hangup();
    return getTwimlXml(vr);
  }

  const g = vr.gather({
    input: response.keypad ? ['speech', 'dtmf'] : ['speech'],
    ...(response.keypad ? { finishOnKey: '#' } : {}),
    timeout: options.timeoutSeconds ?? 5,
    speechTimeout: 'auto',
    actionOnEmptyResult: true,
    action: options.actionUrl,
    method: 'POST',
  });
  g.say({ voice: options.voice }, prompt);
  return getTwimlXml(vr);
}

/**
 * Apology and hang-up, used when the webhook itself fails
 */
export function renderApologyTwiml(voice: SupportedVoice, message?: string): string {
  const vr = new twilio.twiml.VoiceResponse();
  vr.say({ voice }, message ?? "Sorry, we're having a technical problem. Please call back in a few minutes. Goodbye.");
  vr.hangup();
  return getTwimlXml(vr);
}
