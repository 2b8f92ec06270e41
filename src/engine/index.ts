import type { Contract } from '../contracts/base';
import { issue } from '../schema';
import type { CheckOutput } from '../types';

/**
 * 对一个值执行一次校验，把 ValidationError 转成 issue 列表。
 * 配置类错误（如未绑定的 ForwardC）属于编程错误，照常抛出。
 */
export function run_check(contract: Contract, value: unknown): CheckOutput {
  const t0 = Date.now();
  const result = contract.validate(value);
  if (result.ok) {
    return { ok: true, errors: [], time_ms: Date.now() - t0 };
  }
  const { error } = result;
  // OrC 的分支原因放进 hint，便于定位
  const hint = error.causes.length
    ? error.causes.map((cause, i) => `#${i}: ${cause.located}`).join('; ')
    : undefined;
  return {
    ok: false,
    errors: [issue('VALIDATION_ERROR', error.path ?? '', error.message, hint)],
    time_ms: Date.now() - t0,
  };
}
