import { describe, expect, it } from 'vitest';

import { timestamp, toFileName } from './names.js';

describe('timestamp', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(timestamp(new Date(2024, 0, 5, 9, 7, 3))).toBe('20240105_090703');
  });

  it('pads two-digit fields', () => {
    expect(timestamp(new Date(2023, 10, 30, 23, 59, 58))).toBe('20231130_235958');
  });
});

describe('toFileName', () => {
  it('keeps safe names unchanged', () => {
    expect(toFileName('login_button-2.v1')).toBe('login_button-2.v1');
  });

  it('collapses unsafe runs into single underscores', () => {
    expect(toFileName('#login > button')).toBe('login_button');
  });

  it('handles parametrized test titles', () => {
    expect(toFileName('test login[chromium]')).toBe('test_login_chromium');
  });

  it('falls back when nothing usable is left', () => {
    expect(toFileName('!!!')).toBe('unnamed');
  });

  it('caps the length', () => {
    expect(toFileName('a'.repeat(300))).toHaveLength(120);
  });
});
