/**
 * Voice Webhook Tests
 * The Express app on an ephemeral port, driven the way Twilio posts to it
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import twilio from 'twilio';
import { createApp } from '../app';
import type { VoiceRouteOptions } from '../routes/voice';
import { CallFlowController } from '../services/callFlowHandler';
import { InMemoryAvailabilityResolver } from '../services/availability';
import { createExtractor } from '../ai/extractor';
import { fixedClock, loadTestConfig } from './helpers';

const config = loadTestConfig();
const AUTH_TOKEN = 'test-secret';
const PUBLIC_BASE_URL = 'https://clinic.test';

let server: Server | undefined;

async function start(voice: Partial<VoiceRouteOptions> = {}) {
  const clock = fixedClock();
  const controller = new CallFlowController({
    config,
    extractor: createExtractor({ config, backend: null }),
    resolver: new InMemoryAvailabilityResolver(config, { clock }),
    clock,
  });
  const app = createApp({
    controller,
    nodeEnv: 'test',
    voice: { voice: 'Polly.Joanna-Neural', validateSignatures: false, authToken: AUTH_TOKEN, ...voice },
  });

  const listening = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  server = listening;
  const address = listening.address();
  if (!address || typeof address === 'string') throw new Error('server is not listening on a TCP port');
  const base = `http://127.0.0.1:${address.port}`;

  const post = (path: string, params: Record<string, string>, headers: Record<string, string> = {}) =>
    fetch(`${base}${path}`, { method: 'POST', body: new URLSearchParams(params), headers });

  return { controller, base, post };
}

describe('voice routes', () => {
  afterEach(async () => {
    const s = server;
    server = undefined;
    if (s) await new Promise<void>((resolve, reject) => s.close((err) => (err ? reject(err) : resolve())));
  });

  describe('without signature checks', () => {
    let app: Awaited<ReturnType<typeof start>>;

    beforeEach(async () => {
      app = await start();
    });

    it('greets an incoming call inside a speech gather', async () => {
      const res = await app.post('/api/voice/incoming', { CallSid: 'CA100', From: '+13125550147' });
      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toContain('text/xml');

      const xml = await res.text();
      expect(xml).toContain('action="/api/voice/handle"');
      expect(xml).toContain(
        '<Say voice="Polly.Joanna-Neural">Thanks for calling Lakeshore Spine &amp; Wellness. I can book, reschedule or cancel an appointment. How can I help you today?</Say></Gather>'
      );
      expect(app.controller.getCallState('CA100')?.entities.patientPhone).toBe('+13125550147');
    });

    it('answers each speech result', async () => {
      await app.post('/api/voice/incoming', { CallSid: 'CA101' });
      const res = await app.post('/api/voice/handle', { CallSid: 'CA101', SpeechResult: 'I want to book a massage' });

      expect(await res.text()).toContain(
        '<Say voice="Polly.Joanna-Neural">What day and time would work best for you?</Say></Gather>'
      );
      expect(app.controller.getCallState('CA101')?.dialogueState).toBe('COLLECTING_TIME');
    });

    it('opens a keypad gather for the callback number and books from the keyed digits', async () => {
      const handle = (params: Record<string, string>) => app.post('/api/voice/handle', { CallSid: 'CA104', ...params });
      await app.post('/api/voice/incoming', { CallSid: 'CA104' });
      await handle({ SpeechResult: 'book a chiropractic adjustment at Arlington Heights next Tuesday at 2 pm' });
      await handle({ SpeechResult: 'yes' });

      const ask = await (await handle({ SpeechResult: 'My name is Jamie Rivera' })).text();
      expect(ask).toContain('<Gather input="speech dtmf" finishOnKey="#" timeout="5"');

      const done = await (await handle({ Digits: '8475550199' })).text();
      expect(done).toContain('Your confirmation number is APT-1001. Goodbye!</Say><Hangup/>');
    });

    it('rejects webhooks without a CallSid', async () => {
      const res = await app.post('/api/voice/handle', { SpeechResult: 'hello' });
      expect(res.status).toBe(400);
      expect(await res.text()).toContain(
        "<Say voice=\"Polly.Joanna-Neural\">Sorry, we're having a technical problem. Please call back in a few minutes. Goodbye.</Say><Hangup/>"
      );
    });

    it('releases the call when Twilio reports it completed', async () => {
      await app.post('/api/voice/incoming', { CallSid: 'CA102' });
      expect(app.controller.activeCallCount).toBe(1);

      const ringing = await app.post('/api/voice/status', { CallSid: 'CA102', CallStatus: 'in-progress' });
      expect(ringing.status).toBe(204);
      expect(app.controller.activeCallCount).toBe(1);

      const done = await app.post('/api/voice/status', { CallSid: 'CA102', CallStatus: 'completed' });
      expect(done.status).toBe(204);
      expect(app.controller.activeCallCount).toBe(0);
    });

    it('reports health with the live call count', async () => {
      await app.post('/api/voice/incoming', { CallSid: 'CA103' });
      const res = await fetch(`${app.base}/health`);
      expect(await res.json()).toEqual({ ok: true, env: 'test', activeCalls: 1 });
    });
  });

  describe('with signature checks', () => {
    const params = { CallSid: 'CA200', From: '+13125550147' };
    const url = `${PUBLIC_BASE_URL}/api/voice/incoming`;

    it('accepts a correctly signed request', async () => {
      const app = await start({ validateSignatures: true, publicBaseUrl: PUBLIC_BASE_URL });
      const signature = twilio.getExpectedTwilioSignature(AUTH_TOKEN, url, params);

      const res = await app.post('/api/voice/incoming', params, { 'X-Twilio-Signature': signature });
      expect(res.status).toBe(200);
      const xml = await res.text();
      expect(xml).toContain(`action="${PUBLIC_BASE_URL}/api/voice/handle"`);
      expect(xml).toContain('Thanks for calling Lakeshore Spine &amp; Wellness.');
    });

    it('refuses a forged request', async () => {
      const app = await start({ validateSignatures: true, publicBaseUrl: PUBLIC_BASE_URL });

      const res = await app.post('/api/voice/incoming', params, { 'X-Twilio-Signature': 'forged' });
      expect(res.status).toBe(403);
      expect(await res.text()).toContain('Sorry, we could not verify this call. Please try again later.');
      expect(app.controller.activeCallCount).toBe(0);
    });
  });
});
