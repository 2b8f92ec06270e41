import type { ContractLike } from '../types';
import { format_literal } from '../utils/repr.util';
import { entries_of } from '../utils/value.util';
import { Contract } from './base';
import { to_contract } from './normalize';

/**
 * 同构映射：每个条目的键和值分别满足 key / value contract。
 * 不限制条目数量，也不要求任何键必须存在。
 *
 * @example
 * new MappingC(StringC, IntC).check({ foo: 1, bar: null });
 * // (value for key 'bar'): value is not int
 */
export class MappingC extends Contract {
  readonly key_contract: Contract;
  readonly value_contract: Contract;

  constructor(key: ContractLike, value: ContractLike) {
    super();
    this.key_contract = to_contract(key);
    this.value_contract = to_contract(value);
  }

  check(value: unknown): void {
    const entries = entries_of(value);
    if (entries === null) this.fail('value is not mapping');

    for (const [key, item] of entries) {
      const shown = format_literal(key);
      this.check_child(`(key ${shown})`, this.key_contract, key);
      this.check_child(`(value for key ${shown})`, this.value_contract, item);
    }
  }

  describe(): string {
    return `<${this.key_contract.describe()} => ${this.value_contract.describe()}>`;
  }
}
