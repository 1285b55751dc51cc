/**
 * Speech Helpers Tests
 * Yes/no classification, start-over detection and bare-name replies
 */

import { describe, it, expect } from 'vitest';
import { classifyYesNo, wantsToStartOver, looksLikeName, formatName } from '../utils/speech-helpers';

describe('classifyYesNo', () => {
  const cases: Array<[string, 'yes' | 'no' | 'unclear']> = [
    ['yes', 'yes'],
    ['Yep, book it.', 'yes'],
    ["that's fine", 'yes'],
    ['sounds great', 'yes'],
    ['no', 'no'],
    ['yeah no', 'no'],
    ['absolutely not', 'no'],
    ["that doesn't work for me", 'no'],
    ['something else please', 'no'],
    ['yes, no problem', 'yes'],
    ['no worries, go ahead', 'yes'],
    ['no problem', 'unclear'],
    ['hmm let me think', 'unclear'],
    ['', 'unclear'],
  ];

  cases.forEach(([phrase, expected]) => {
    it(`classifies "${phrase}" as ${expected}`, () => {
      expect(classifyYesNo(phrase)).toBe(expected);
    });
  });
});

describe('wantsToStartOver', () => {
  it('detects restart phrases', () => {
    expect(wantsToStartOver("Actually, let's start over")).toBe(true);
    expect(wantsToStartOver('scratch that')).toBe(true);
    expect(wantsToStartOver('can we begin again')).toBe(true);
  });

  it('ignores unrelated speech', () => {
    expect(wantsToStartOver('the parking is over there')).toBe(false);
  });
});

describe('looksLikeName', () => {
  it('accepts short letter-only replies', () => {
    expect(looksLikeName('Jamie Rivera')).toBe(true);
    expect(looksLikeName("Anne-Marie O'Neil")).toBe(true);
    expect(looksLikeName('José García.')).toBe(true);
  });

  it('rejects booking vocabulary, digits and long sentences', () => {
    expect(looksLikeName('next tuesday')).toBe(false);
    expect(looksLikeName('yes')).toBe(false);
    expect(looksLikeName('APT 1001')).toBe(false);
    expect(looksLikeName('I would really like one soon')).toBe(false);
  });
});

describe('formatName', () => {
  it('title-cases each part, including after apostrophes and hyphens', () => {
    expect(formatName('jamie rivera')).toBe('Jamie Rivera');
    expect(formatName("  anne-marie o'neil ")).toBe("Anne-Marie O'Neil");
  });
});
