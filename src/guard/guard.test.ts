import { describe, it, expect, vi } from 'vitest';

import { guard, collect_args } from './guard';
import { DictC } from '../contracts/dict';
import { ForwardC } from '../contracts/forward';
import { ListC } from '../contracts/list';
import { IntC } from '../contracts/number';
import { StringC } from '../contracts/primitives';
import { ConfigurationError, GuardValidationError, ValidationError } from '../contracts/errors';

describe('collect_args', () => {
  it('zips positional arguments with parameter names and fills defaults', () => {
    expect(collect_args(['a', 'b', 'c'], ['foo', 1], { c: 'default' })).toEqual({
      a: 'foo',
      b: 1,
      c: 'default',
    });
  });

  it('leaves out omitted parameters without defaults', () => {
    expect(collect_args(['a', 'b'], ['foo'])).toEqual({ a: 'foo' });
    expect(collect_args(['a', 'b'], ['foo', undefined])).toEqual({ a: 'foo' });
  });

  it('keeps explicit null', () => {
    expect(collect_args(['a'], [null], { a: 'x' })).toEqual({ a: null });
  });
});

describe('guard', () => {
  const make = () =>
    guard(
      { params: ['a', 'b', 'c'], shape: { a: StringC, b: IntC, c: StringC }, defaults: { c: 'default' } },
      (a: string, b: number, c: string = 'default') => [a, b, c] as const
    );

  it('calls through with valid arguments', () => {
    expect(make()('foo', 1)).toEqual(['foo', 1, 'default']);
    expect(make()('foo', 1, 'bar')).toEqual(['foo', 1, 'bar']);
  });

  it('raises a guard error with the located message and skips the call', () => {
    const impl = vi.fn((a: unknown, b: unknown) => [a, b]);
    const fn = guard({ params: ['a', 'b'], shape: { a: StringC, b: IntC } }, impl);

    let caught: unknown;
    try {
      fn('foo', 'x');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(GuardValidationError);
    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) expect(caught.located).toBe('b: value is not int');
    expect(impl).not.toHaveBeenCalled();
  });

  it('reports missing arguments', () => {
    const fn = guard({ params: ['a', 'b'], shape: { a: StringC, b: IntC } }, (a: string, b?: number) => a + String(b));
    expect(() => fn('foo')).toThrow(GuardValidationError);
    expect(() => fn('foo')).toThrow('b is required');
  });

  it('keeps `this` for methods', () => {
    class Counter {
      total = 10;
      add = guard({ params: ['n'], shape: { n: IntC } }, function (this: Counter, n: number) {
        return this.total + n;
      });
    }
    const counter = new Counter();
    expect(counter.add(5)).toBe(15);
  });

  it('accepts a DictC or a ForwardC', () => {
    const dict = new DictC({ name: StringC });
    expect(guard({ params: ['name'], contract: dict }, (name: string) => name).contract).toBe(dict);

    const node = new ForwardC();
    node.define(new DictC({ name: StringC, children: new ListC(node) }));
    const fn = guard({ params: ['name', 'children'], contract: node }, (name: string, _children: unknown[]) => name);
    expect(fn('root', [{ name: 'leaf', children: [] }])).toBe('root');
    expect(() => fn('root', [1])).toThrow('value is not dict');
  });

  it('defaults to the empty DictC', () => {
    const fn = guard({ params: [] }, () => 'ok');
    expect(fn()).toBe('ok');
    expect(fn.contract.describe()).toBe('<DictC()>');
  });

  it('rejects other contracts and mixed initialization', () => {
    expect(() => Reflect.apply(guard, undefined, [{ params: ['a'], contract: new IntC() }, () => 1])).toThrow(
      'contract should be instance of DictC or ForwardC'
    );
    expect(() =>
      guard({ params: ['a'], contract: new DictC({ a: IntC }), shape: { a: IntC } }, (a: number) => a)
    ).toThrow(ConfigurationError);
  });

  it('validation errors raised inside the body are not converted', () => {
    const inner = new DictC({ x: IntC });
    const fn = guard({ params: ['v'], shape: { v: StringC } }, (_v: string) => inner.check({ x: 'no' }));
    try {
      fn('ok');
      throw new Error('expected failure');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).not.toBeInstanceOf(GuardValidationError);
    }
  });
});
