import { describe, it, expect } from 'vitest';
import { categoryClass, escapeHtml, formatEntry } from '../../src/render/markup.js';

describe('escapeHtml', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#x27;s&lt;/a&gt;',
    );
  });

  it('should return an empty string for absent values', () => {
    expect(escapeHtml(null)).toBe('');
    expect(escapeHtml(undefined)).toBe('');
    expect(escapeHtml('')).toBe('');
  });
});

describe('formatEntry', () => {
  it('should convert strikethrough', () => {
    expect(formatEntry('~~LHRP Charlie Cole~~')).toBe('<s>LHRP Charlie Cole</s>');
  });

  it('should convert single-underscore italics', () => {
    expect(formatEntry('_SS India Irwin (TOR, AA)_')).toBe('<em>SS India Irwin (TOR, AA)</em>');
  });

  it('should nest italics inside strikethrough', () => {
    expect(formatEntry('~~_Claimed_~~')).toBe('<s><em>Claimed</em></s>');
  });

  it('should leave double underscores alone', () => {
    expect(formatEntry('a__b__c')).toBe('a__b__c');
  });

  it('should match the shortest italic run', () => {
    expect(formatEntry('_one_ and _two_')).toBe('<em>one</em> and <em>two</em>');
  });

  it('should escape before converting annotations', () => {
    expect(formatEntry('~~A & <B>~~')).toBe('<s>A &amp; &lt;B&gt;</s>');
  });

  it('should never emit a script tag from entry text', () => {
    expect(formatEntry('<script>alert(1)</script>')).toBe('&lt;script&gt;alert(1)&lt;/script&gt;');
  });

  it('should return an empty string for absent values', () => {
    expect(formatEntry(null)).toBe('');
  });
});

describe('categoryClass', () => {
  it.each([
    ['MLB Signings', 'signing'],
    ['Intl Amateur Signings', 'signing'],
    ['Extensions', 'signing'],
    ['Traded For', 'trade'],
    ['Traded Away', 'trade'],
    ['Waiver Claims', 'waiver'],
    ['Lost off Waivers', 'lost'],
    ['Released', ''],
    ['Rule-5 Draft Additions', ''],
  ])('should map %s to %j', (category, expected) => {
    expect(categoryClass(category)).toBe(expected);
  });
});
