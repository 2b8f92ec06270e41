import type { CheckResult } from '../types';
import { ValidationError } from './errors';

/**
 * 所有 contract 的基类。
 *
 * 子类只需实现：
 * - check(value)：通过则正常返回，失败则抛出 ValidationError（每次调用至多抛一次）
 * - describe()：人类可读的描述，组合 contract 会递归拼接子描述
 *
 * check 不得修改 contract 自身配置；同一输入重复调用结果一致。
 */
export abstract class Contract {
  abstract check(value: unknown): void;

  abstract describe(): string;

  /** 不抛异常的校验入口：把 ValidationError 转成结果对象，其他异常照常抛出 */
  validate(value: unknown): CheckResult {
    try {
      this.check(value);
      return { ok: true };
    } catch (err) {
      if (err instanceof ValidationError) return { ok: false, error: err };
      throw err;
    }
  }

  is_valid(value: unknown): boolean {
    return this.validate(value).ok;
  }

  toString(): string {
    return this.describe();
  }

  /** 抛出不带路径的校验错误；路径由外层组合 contract 负责补全 */
  protected fail(message: string): never {
    throw new ValidationError(message);
  }

  /**
   * 委托子 contract 校验；子级失败时以 prefix 为路径前缀重新抛出。
   * 非 ValidationError（例如 ConfigurationError）原样向上传播。
   */
  protected check_child(prefix: string, contract: Contract, value: unknown): void {
    try {
      contract.check(value);
    } catch (err) {
      if (err instanceof ValidationError) throw err.with_prefix(prefix);
      throw err;
    }
  }
}
