import type { ContractLike } from '../types';
import { Contract } from './base';
import { ValidationError } from './errors';
import { to_contract } from './normalize';

/**
 * 按顺序尝试每个分支，第一个通过即通过；全部失败时报 "no one contract matches"，
 * 各分支的失败原因按顺序保存在 error.causes 中。
 *
 * @example
 * const nullable_string = new OrC(StringC, NullC);
 * nullable_string.describe(); // String or Null
 */
export class OrC extends Contract {
  private readonly contracts: Contract[];

  constructor(...contracts: ContractLike[]) {
    super();
    this.contracts = contracts.map(to_contract);
  }

  /** 追加一个分支，返回自身便于链式调用 */
  add(contract: ContractLike): this {
    this.contracts.push(to_contract(contract));
    return this;
  }

  get branches(): readonly Contract[] {
    return this.contracts;
  }

  check(value: unknown): void {
    const causes: ValidationError[] = [];
    for (const contract of this.contracts) {
      const result = contract.validate(value);
      if (result.ok) return;
      causes.push(result.error);
    }
    throw new ValidationError('no one contract matches', undefined, causes);
  }

  describe(): string {
    return this.contracts.map((c) => c.describe()).join(' or ');
  }
}

/** `a | b | c` 的具名写法 */
export function either(...contracts: ContractLike[]): OrC {
  return new OrC(...contracts);
}
