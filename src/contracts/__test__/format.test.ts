import { describe, it, expect } from 'vitest';

import { EmailC, IsoDateC } from '../format';

describe('EmailC', () => {
  const c = new EmailC();

  it('accepts plain addresses', () => {
    expect(c.is_valid('alex.gonzalez@example.eu')).toBe(true);
    expect(c.is_valid('first+tag@mail.example.org')).toBe(true);
    expect(c.is_valid('"quoted"@example.com')).toBe(true);
    expect(c.is_valid('user@[192.168.0.1]')).toBe(true);
  });

  it('retries internationalized domains in ASCII form', () => {
    expect(c.is_valid('user@bücher.example')).toBe(true);
  });

  it('rejects everything else with a fixed message', () => {
    for (const value of [1, '', 'alex', 'alex@', '@example.com', 'a b@example.com', 'user@exa mple.com']) {
      const result = c.validate(value);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('value is not email');
    }
  });

  it('describe', () => {
    expect(c.describe()).toBe('String with email format');
  });
});

describe('IsoDateC', () => {
  const c = new IsoDateC();

  it('accepts dates and date-times', () => {
    expect(c.is_valid('2024-01-15')).toBe(true);
    expect(c.is_valid('2024-01-15T10:30:00Z')).toBe(true);
    expect(c.is_valid('2024-01-15T10:30:00+02:00')).toBe(true);
    expect(c.is_valid('2024-01-15T10:30:00.123')).toBe(true);
  });

  it('rejects other values and quotes them in the message', () => {
    const result = c.validate('not a date');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("value is not an iso formatted date: 'not a date'");

    const missing = c.validate(undefined);
    if (!missing.ok) expect(missing.error.message).toBe('value is not an iso formatted date: undefined');
    expect(missing.ok).toBe(false);

    expect(c.is_valid('2024-13-01')).toBe(false);
    expect(c.is_valid('')).toBe(false);
    expect(c.is_valid(20240115)).toBe(false);
  });

  it('describe', () => {
    expect(c.describe()).toBe('ISO formatted date');
  });
});
