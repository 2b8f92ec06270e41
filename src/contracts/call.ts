import { Contract } from './base';
import { ConfigurationError } from './errors';

/** 自定义校验函数：返回 undefined / null 表示通过，返回字符串即失败消息 */
export type Predicate = (value: unknown) => string | null | undefined | void;

/**
 * 用单参数函数表达任意检查。
 * 函数在构造时校验：必须可调用，且第一个默认参数之前至多声明一个参数。
 *
 * @example
 * const only_foo = new CallC((v) => (v === 'foo' ? undefined : 'I want only foo!'));
 */
export class CallC extends Contract {
  readonly fn: Predicate;

  constructor(fn: Predicate) {
    super();
    const candidate: unknown = fn;
    if (typeof candidate !== 'function') {
      throw new ConfigurationError('CallC argument should be callable');
    }
    // Function.length 只计入第一个默认参数/剩余参数之前的形参
    if (candidate.length > 1) {
      throw new ConfigurationError('CallC argument should be one argument function');
    }
    this.fn = fn;
  }

  check(value: unknown): void {
    const error = this.fn(value);
    if (error !== undefined && error !== null) this.fail(String(error));
  }

  describe(): string {
    return `<CallC(${this.fn.name || 'anonymous'})>`;
  }
}
