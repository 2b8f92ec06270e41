import type { ContractClass, ContractLike, RuntimeType } from '../types';
import { format_literal } from '../utils/repr.util';
import { Contract } from './base';
import { ConfigurationError } from './errors';
import { TypeC } from './type';

/**
 * 判定是否为 contract 子类（而不是普通构造器）。
 * 箭头函数没有 prototype，这里一并排除。
 */
function is_contract_class(arg: unknown): arg is ContractClass {
  return typeof arg === 'function' && arg.prototype instanceof Contract;
}

function is_runtime_type(arg: unknown): arg is RuntimeType {
  return typeof arg === 'function' && typeof arg.prototype === 'object' && arg.prototype !== null;
}

/**
 * 把组合 contract 收到的参数统一成 contract 实例：
 * 实例原样返回；contract 类无参实例化；其他构造器包装为 TypeC。
 * 在构造阶段调用，此后内部只面对 Contract。
 */
export function to_contract(arg: ContractLike): Contract {
  const candidate: unknown = arg;
  if (candidate instanceof Contract) return candidate;
  if (is_contract_class(candidate)) return new candidate();
  if (is_runtime_type(candidate)) return new TypeC(candidate);
  throw new ConfigurationError(
    `${format_literal(candidate)} should be instance or subclass of Contract`
  );
}
