/**
 * Guarded extraction: language model first, keywords on any failure
 */

import { describe, it, expect, vi } from 'vitest';
import {
  GuardedExtractor,
  KeywordStrategy,
  LanguageModelStrategy,
  OpenAIBackend,
  createBackendFromEnv,
  createExtractor,
  type LanguageModelBackend,
} from '../ai';
import { ExtractionFailure } from '../errors';
import type { ExtractionStrategy } from '../types/extraction';
import { extractionContext, loadTestConfig } from './helpers';

const config = loadTestConfig();

function fakeBackend(reply: (signal?: AbortSignal) => Promise<string>): LanguageModelBackend {
  return {
    name: 'fake',
    complete: (_messages, options) => reply(options?.signal),
  };
}

const FULL_REPLY = JSON.stringify({
  intent: 'schedule',
  confidence: 0.95,
  entities: {
    service: 'acupuncture',
    location: 'Highland Park',
    doctor_name: 'doctor lin',
    requested_date: '2026-10-21',
    time_of_day: 'afternoon',
    exact_time: null,
    patient_name: 'Jamie Rivera',
    any_doctor: null,
  },
});

describe('LanguageModelStrategy', () => {
  it('maps model output onto the clinic vocabularies', async () => {
    const strategy = new LanguageModelStrategy(fakeBackend(async () => FULL_REPLY), config);
    const core = await strategy.run('acupuncture with doctor lin wednesday afternoon', extractionContext());
    expect(core).toEqual({
      intent: 'schedule',
      confidence: 0.95,
      entities: {
        service: 'acupuncture',
        location: 'highland_park',
        doctorName: 'Dr. Mei Lin',
        requestedDate: '2026-10-21',
        timeOfDay: 'afternoon',
        patientName: 'Jamie Rivera',
      },
    });
  });

  it('drops past dates and values outside the vocabularies', async () => {
    const reply = JSON.stringify({
      intent: 'schedule',
      entities: { service: 'reiki', location: 'downtown', requested_date: '2026-10-01', exact_time: '25:00' },
    });
    const strategy = new LanguageModelStrategy(fakeBackend(async () => reply), config);
    const core = await strategy.run('reiki downtown', extractionContext());
    expect(core).toEqual({ intent: 'schedule', entities: {}, confidence: 0.9 });
  });

  it('drops calendar dates that do not exist', async () => {
    const reply = JSON.stringify({
      intent: 'schedule',
      entities: { service: 'massage', requested_date: '2026-11-31' },
    });
    const strategy = new LanguageModelStrategy(fakeBackend(async () => reply), config);
    const core = await strategy.run('massage on november thirty first', extractionContext());
    expect(core.entities).toEqual({ service: 'massage' });
  });

  it('accepts JSON wrapped in prose', async () => {
    const strategy = new LanguageModelStrategy(
      fakeBackend(async () => 'Sure! {"intent":"cancel","entities":{"appointment_ref":"apt 1001"}}'),
      config
    );
    const core = await strategy.run('cancel apt 1001', extractionContext());
    expect(core.intent).toBe('cancel');
    expect(core.entities).toEqual({ appointmentRef: 'APT-1001' });
  });

  it('throws ExtractionFailure on malformed output', async () => {
    const strategy = new LanguageModelStrategy(fakeBackend(async () => '{"intent":"dance"}'), config);
    await expect(strategy.run('hi', extractionContext())).rejects.toMatchObject({
      name: 'ExtractionFailure',
      reason: 'malformed',
    });
  });
});

describe('GuardedExtractor', () => {
  const utterance = 'I need a massage next Tuesday';

  it('uses the language model when it answers in time', async () => {
    const extractor = createExtractor({ config, backend: fakeBackend(async () => FULL_REPLY), timeoutMs: 500 });
    const result = await extractor.extract('yes, that works', extractionContext({ awaiting: 'confirmation' }));
    expect(result.source).toBe('llm');
    expect(result.confirmation).toBe('yes');
    expect(result.entities.service).toBe('acupuncture');
  });

  it('falls back to keywords when the model times out, and aborts the request', async () => {
    let aborted = false;
    const backend = fakeBackend(
      (signal) =>
        new Promise<string>(() => {
          signal?.addEventListener('abort', () => {
            aborted = true;
          });
        })
    );
    const extractor = createExtractor({ config, backend, timeoutMs: 20 });
    const result = await extractor.extract(utterance, extractionContext());
    expect(result.source).toBe('keyword');
    expect(result.intent).toBe('schedule');
    expect(result.entities).toEqual({ service: 'massage', requestedDate: '2026-10-20' });
    expect(aborted).toBe(true);
  });

  it('falls back to keywords when the model fails', async () => {
    const failing: ExtractionStrategy = {
      source: 'llm',
      run: vi.fn(async () => {
        throw new ExtractionFailure('http', 'OpenAI API error 500');
      }),
    };
    const extractor = new GuardedExtractor({ primary: failing, fallback: new KeywordStrategy(config), timeoutMs: 500 });
    const result = await extractor.extract(utterance, extractionContext());
    expect(failing.run).toHaveBeenCalledTimes(1);
    expect(result.source).toBe('keyword');
    expect(result.entities.service).toBe('massage');
  });

  it('uses keywords only when no backend is configured', async () => {
    const extractor = createExtractor({ config, backend: null });
    const result = await extractor.extract('What are your hours?', extractionContext());
    expect(result).toEqual({
      intent: 'inquiry',
      entities: {},
      confidence: 0.6,
      confirmation: undefined,
      startOver: false,
      inquiryTopic: 'hours',
      mentionedPastDate: false,
      source: 'keyword',
    });
  });

  it('treats a bare service request as scheduling before any intent is locked', async () => {
    const extractor = createExtractor({ config, backend: null });
    const result = await extractor.extract('massage on Friday', extractionContext());
    expect(result.intent).toBe('schedule');
    expect(result.entities).toEqual({ service: 'massage', requestedDate: '2026-10-23' });
  });

  it('flags a date that resolved to the past', async () => {
    const extractor = createExtractor({ config, backend: null });
    const result = await extractor.extract(
      'how about September 3rd',
      extractionContext({ dialogueState: 'COLLECTING_TIME', intent: 'schedule', awaiting: 'requestedDate' })
    );
    expect(result.entities.requestedDate).toBe('2027-09-03');
    expect(result.mentionedPastDate).toBe(false);

    const past = await extractor.extract(
      'yesterday',
      extractionContext({ dialogueState: 'COLLECTING_TIME', intent: 'schedule', awaiting: 'requestedDate' })
    );
    expect(past.entities.requestedDate).toBeUndefined();
    expect(past.mentionedPastDate).toBe(true);
  });
});

describe('OpenAIBackend', () => {
  function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
  }

  it('posts a chat completion request and returns the content', async () => {
    const fetchImpl = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ choices: [{ message: { content: ' {"intent":"unknown"} ' } }] })
    );
    const backend = new OpenAIBackend({ apiKey: 'test-key', baseUrl: 'http://llm.test/v1/', fetchImpl });

    const content = await backend.complete([{ role: 'user', content: 'hi' }], { json: true });

    expect(content).toBe('{"intent":"unknown"}');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://llm.test/v1/chat/completions');
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: 'gpt-4o-mini',
      response_format: { type: 'json_object' },
    });
  });

  it('maps HTTP errors and empty completions to ExtractionFailure', async () => {
    const failing = new OpenAIBackend({
      apiKey: 'test-key',
      fetchImpl: async () => new Response('overloaded', { status: 503 }),
    });
    await expect(failing.complete([{ role: 'user', content: 'hi' }])).rejects.toMatchObject({ reason: 'http' });

    const empty = new OpenAIBackend({
      apiKey: 'test-key',
      fetchImpl: async () => jsonResponse({ choices: [{ message: { content: '   ' } }] }),
    });
    await expect(empty.complete([{ role: 'user', content: 'hi' }])).rejects.toMatchObject({ reason: 'empty' });
  });

  it('is not created without an API key', () => {
    expect(createBackendFromEnv({ OPENAI_API_KEY: '', OPENAI_BASE_URL: '', OPENAI_MODEL: 'gpt-4o-mini' })).toBeNull();
  });
});
