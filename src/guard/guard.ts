import type { ContractLike } from '../types';
import { Contract } from '../contracts/base';
import { DictC } from '../contracts/dict';
import { ConfigurationError, GuardValidationError, ValidationError } from '../contracts/errors';
import { ForwardC } from '../contracts/forward';

/** guard 的配置：参数名（按位置）+ 校验方式 */
export interface GuardSpec {
  /** 被保护函数的形参名，按位置对应实参 */
  params: readonly string[];
  /** 现成的映射 contract（DictC 或指向 DictC 的 ForwardC） */
  contract?: DictC | ForwardC;
  /** 或者直接给出 参数名 → contract，内部构造 DictC */
  shape?: Record<string, ContractLike>;
  /** 省略参数（实参为 undefined）时使用的默认值 */
  defaults?: Record<string, unknown>;
}

export type Guarded<A extends unknown[], R> = ((...args: A) => R) & {
  /** 用于校验参数映射的 contract */
  readonly contract: Contract;
};

function resolve_contract(spec: GuardSpec): Contract {
  const candidate: unknown = spec.contract;
  if (candidate !== undefined && !(candidate instanceof DictC) && !(candidate instanceof ForwardC)) {
    throw new ConfigurationError('contract should be instance of DictC or ForwardC');
  }
  if (candidate !== undefined && spec.shape) {
    throw new ConfigurationError('choose one way of initialization, contract or shape');
  }
  return spec.contract ?? new DictC(spec.shape ?? {});
}

/** 把位置参数拼成 参数名 → 值 的映射；undefined 走默认值，没有默认值则不放入 */
export function collect_args(
  params: readonly string[],
  args: readonly unknown[],
  defaults: Record<string, unknown> = {}
): Record<string, unknown> {
  const call_args: Record<string, unknown> = {};
  params.forEach((name, index) => {
    const value = index < args.length ? args[index] : undefined;
    if (value !== undefined) call_args[name] = value;
    else if (Object.hasOwn(defaults, name)) call_args[name] = defaults[name];
  });
  return call_args;
}

/**
 * 包装函数：每次调用前按 contract 校验参数映射，
 * 失败时抛出 GuardValidationError 且不调用原函数。
 *
 * @example
 * const greet = guard({ params: ['name', 'times'], shape: { name: StringC, times: IntC },
 *                       defaults: { times: 1 } },
 *                     (name: string, times?: number) => name.repeat(times ?? 1));
 * greet('a', 2);   // 'aa'
 * greet('a', 'x'); // GuardValidationError: times: value is not int
 */
export function guard<A extends unknown[], R>(
  spec: GuardSpec,
  fn: (...args: A) => R
): Guarded<A, R> {
  const contract = resolve_contract(spec);

  const guarded = function (this: unknown, ...args: A): R {
    try {
      contract.check(collect_args(spec.params, args, spec.defaults));
    } catch (err) {
      if (err instanceof ValidationError) throw new GuardValidationError(err);
      throw err;
    }
    return fn.apply(this, args);
  };

  return Object.assign(guarded, { contract });
}
