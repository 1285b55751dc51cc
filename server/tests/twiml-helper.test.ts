import { describe, it, expect } from 'vitest';
import { renderApologyTwiml, renderTurnTwiml, ttsClean } from '../utils/twiml-helper';

const options = { voice: 'Polly.Joanna-Neural' as const, actionUrl: '/api/voice/handle' };

describe('renderTurnTwiml', () => {
  it('speaks the prompt inside a speech gather that posts back to the handler', () => {
    const xml = renderTurnTwiml({ prompt: 'Which location would you prefer?', shouldEndCall: false }, options);
    expect(xml).toContain(
      '<Gather input="speech" timeout="5" speechTimeout="auto" actionOnEmptyResult="true" action="/api/voice/handle" method="POST">'
    );
    expect(xml).toContain('<Say voice="Polly.Joanna-Neural">Which location would you prefer?</Say></Gather>');
    expect(xml).not.toContain('<Hangup/>');
  });

  it('also takes keypad digits ended with # when asked for a number', () => {
    const xml = renderTurnTwiml({ prompt: 'What number?', shouldEndCall: false, keypad: true }, options);
    expect(xml).toContain(
      '<Gather input="speech dtmf" finishOnKey="#" timeout="5" speechTimeout="auto" actionOnEmptyResult="true" action="/api/voice/handle" method="POST">'
    );
  });

  it('says goodbye and hangs up when the call should end', () => {
    const xml = renderTurnTwiml({ prompt: 'Thanks for calling. Goodbye.', shouldEndCall: true }, options);
    expect(xml).toContain('<Response><Say voice="Polly.Joanna-Neural">Thanks for calling. Goodbye.</Say><Hangup/></Response>');
    expect(xml).not.toContain('<Gather');
  });

  it('hangs up without a Say when there is nothing to speak', () => {
    const xml = renderTurnTwiml({ prompt: '', shouldEndCall: true }, options);
    expect(xml).toContain('<Response><Hangup/></Response>');
  });
});

describe('renderApologyTwiml', () => {
  it('apologizes and hangs up', () => {
    const xml = renderApologyTwiml('alice', 'Sorry, there was a problem.');
    expect(xml).toContain('<Say voice="alice">Sorry, there was a problem.</Say><Hangup/>');
  });
});

describe('ttsClean', () => {
  it('replaces typographic characters and strips the rest of non-ASCII', () => {
    expect(ttsClean('It’s — fine…')).toBe("It's - fine...");
    expect(ttsClean('Hi 🙂 there\n')).toBe('Hi there');
    expect(ttsClean(undefined)).toBe('');
  });
});
