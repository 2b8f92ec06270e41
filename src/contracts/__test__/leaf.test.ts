import { describe, it, expect } from 'vitest';

import { AnyC, TypeC } from '../type';
import { BoolC, CallableC, NullC, StringC } from '../primitives';
import { EnumC } from '../enum';
import { CallC } from '../call';
import { ConfigurationError, ValidationError } from '../errors';

/** 取出 check 抛出的 ValidationError（未抛出则测试失败） */
function failure_of(run: () => void): ValidationError {
  try {
    run();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected check to fail');
}

describe('TypeC / AnyC', () => {
  it('checks instanceof including subclasses', () => {
    class Animal {}
    class Dog extends Animal {}
    const c = new TypeC(Animal);
    expect(() => c.check(new Dog())).not.toThrow();
    expect(failure_of(() => c.check({})).message).toBe('value is not Animal');
    expect(c.describe()).toBe('<type(Animal)>');
  });

  it('wrapper constructors also accept the primitive', () => {
    const c = new TypeC(String);
    expect(c.is_valid('foo')).toBe(true);
    expect(c.is_valid(new String('foo'))).toBe(true);
    expect(failure_of(() => c.check(1)).message).toBe('value is not String');
  });

  it('AnyC accepts everything', () => {
    const c = new AnyC();
    for (const v of [null, undefined, 0, '', {}, [], () => 1]) {
      expect(c.is_valid(v)).toBe(true);
    }
    expect(String(c)).toBe('Any');
  });
});

describe('NullC / BoolC', () => {
  it('NullC', () => {
    expect(new NullC().is_valid(null)).toBe(true);
    expect(failure_of(() => new NullC().check(undefined)).message).toBe('value should be null');
    expect(new NullC().describe()).toBe('Null');
  });

  it('BoolC', () => {
    const c = new BoolC();
    expect(c.is_valid(true)).toBe(true);
    expect(c.is_valid(false)).toBe(true);
    expect(failure_of(() => c.check(1)).message).toBe('value should be true or false');
    expect(c.describe()).toBe('Boolean');
  });
});

describe('StringC', () => {
  it('rejects non-strings and blank strings by default', () => {
    const c = new StringC();
    expect(c.is_valid('foo')).toBe(true);
    expect(failure_of(() => c.check('')).message).toBe('blank value is not allowed');
    expect(failure_of(() => c.check(1)).message).toBe('value is not string');
    expect(c.describe()).toBe('String');
  });

  it('allow_blank accepts the empty string', () => {
    const c = new StringC({ allow_blank: true });
    expect(c.is_valid('')).toBe(true);
    expect(c.describe()).toBe('String (could be blank)');
  });
});

describe('EnumC', () => {
  it('matches by value, not identity', () => {
    const c = new EnumC('foo', 'bar', 1, { kind: 'x' });
    expect(c.is_valid('foo')).toBe(true);
    expect(c.is_valid(1)).toBe(true);
    expect(c.is_valid({ kind: 'x' })).toBe(true);
    expect(failure_of(() => c.check(2)).message).toBe("value doesn't match any variant");
    expect(c.is_valid('1')).toBe(false);
  });

  it('describes variants joined by or', () => {
    expect(new EnumC('foo', 'bar', 1).describe()).toBe("'foo' or 'bar' or 1");
  });
});

describe('CallableC', () => {
  it('accepts functions and classes', () => {
    const c = new CallableC();
    expect(c.is_valid(() => 1)).toBe(true);
    expect(c.is_valid(class {})).toBe(true);
    expect(failure_of(() => c.check(1)).message).toBe('value is not callable');
    expect(c.describe()).toBe('<callable>');
  });
});

describe('CallC', () => {
  function only_foo(value: unknown): string | undefined {
    return value === 'foo' ? undefined : 'I want only foo!';
  }

  it('passes when the predicate returns nothing and fails with its message', () => {
    const c = new CallC(only_foo);
    expect(c.is_valid('foo')).toBe(true);
    const err = failure_of(() => c.check('bar'));
    expect(err.message).toBe('I want only foo!');
    expect(err.path).toBeUndefined();
    expect(c.describe()).toBe('<CallC(only_foo)>');
  });

  it('null counts as a pass', () => {
    expect(new CallC(() => null).is_valid(1)).toBe(true);
  });

  it('rejects non-callables at construction time', () => {
    // 绕过静态类型，模拟 JS 调用方传入非函数
    expect(() => Reflect.construct(CallC, ['nope'])).toThrow(ConfigurationError);
    expect(() => Reflect.construct(CallC, ['nope'])).toThrow('CallC argument should be callable');
  });

  it('rejects functions with more than one required parameter', () => {
    const two_args = (a: unknown, b: unknown) => (a === b ? undefined : 'differs');
    expect(() => Reflect.construct(CallC, [two_args])).toThrow('CallC argument should be one argument function');
  });

  it('parameters with defaults do not count as required', () => {
    const with_default = (value: unknown, limit = 3): string | undefined =>
      typeof value === 'number' && value > limit ? 'too big' : undefined;
    expect(new CallC(with_default).is_valid(2)).toBe(true);
    expect(new CallC(with_default).is_valid(5)).toBe(false);
  });
});
