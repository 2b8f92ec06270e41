import { describe, it, expect } from 'vitest';

import { OrC, either } from '../or';
import { IntC } from '../number';
import { NullC, StringC } from '../primitives';
import { ListC } from '../list';
import { ValidationError } from '../errors';

describe('OrC', () => {
  it('first matching branch wins', () => {
    const c = new OrC(IntC, NullC);
    expect(c.is_valid(null)).toBe(true);
    expect(c.is_valid(5)).toBe(true);
  });

  it('fails with a single message when no branch matches', () => {
    const result = new OrC(IntC, NullC).validate('x');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('no one contract matches');
      expect(result.error.path).toBeUndefined();
    }
  });

  it('keeps the reason of every branch in order', () => {
    const result = new OrC(IntC, NullC).validate('x');
    if (result.ok) throw new Error('expected failure');
    expect(result.error.causes.map((e) => e.message)).toEqual(['value is not int', 'value should be null']);
  });

  it('an empty alternation matches nothing', () => {
    expect(new OrC().is_valid(1)).toBe(false);
  });

  it('add appends branches after construction', () => {
    const c = new OrC(StringC).add(NullC).add(IntC);
    expect(c.describe()).toBe('String or Null or Integer');
    expect(c.is_valid(3)).toBe(true);
    expect(c.branches).toHaveLength(3);
  });

  it('either builds the same contract', () => {
    expect(either(IntC, StringC).describe()).toBe('Integer or String');
    expect(either(IntC, StringC, NullC).describe()).toBe('Integer or String or Null');
  });

  it('gets the index prefix when nested in a list', () => {
    try {
      new ListC(either(IntC, NullC)).check([1, null, 'x']);
      throw new Error('expected failure');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) expect(err.located).toBe('2: no one contract matches');
    }
  });
});
