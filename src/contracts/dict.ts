import type { ContractLike, DictPolicy } from '../types';
import { format_group } from '../utils/repr.util';
import { entries_of } from '../utils/value.util';
import { Contract } from './base';
import { to_contract } from './normalize';

/** allow_extra / allow_optionals 的通配符 */
export const WILDCARD = '*';

/**
 * 键控映射（对象 schema）。
 *
 * 校验分两遍：
 *  1. 存在性：按声明顺序找第一个「非可选且缺失」的键 → "<key> is required"
 *  2. 逐项：值里出现的每个键，已声明的交给对应 contract（路径前缀为键名），
 *     未声明且不在 extras 中、也未开启 allow_any 的 → "<key> is not allowed key"
 *
 * 接受普通对象与 Map。键策略（extras / optionals / allow_any）可在构造时给出，
 * 也可以之后通过 allow_extra / allow_optionals 追加；应在开始共享校验前完成。
 *
 * @example
 * const user = new DictC({ name: StringC, age: IntC }, { optionals: ['age'] });
 * user.check({ name: 'ann' });          // ok
 * user.check({ name: 'ann', age: '1' }); // age: value is not int
 */
export class DictC extends Contract {
  private readonly contracts: ReadonlyMap<string, Contract>;
  private readonly optionals = new Set<string>();
  private readonly extras = new Set<string>();
  private allow_any = false;

  constructor(shape: Record<string, ContractLike> = {}, policy: DictPolicy = {}) {
    super();
    this.contracts = new Map(
      Object.entries(shape).map(([key, contract]) => [key, to_contract(contract)] as const)
    );
    if (policy.allow_any) this.allow_any = true;
    this.allow_extra(...(policy.extras ?? []));
    this.allow_optionals(...(policy.optionals ?? []));
  }

  /** 声明的键（声明顺序） */
  get keys(): string[] {
    return [...this.contracts.keys()];
  }

  /** 取某个键的 contract（未声明返回 undefined） */
  field(key: string): Contract | undefined {
    return this.contracts.get(key);
  }

  /** 放行额外键；传入 "*" 则放行任意键 */
  allow_extra(...names: string[]): this {
    for (const name of names) {
      if (name === WILDCARD) this.allow_any = true;
      else this.extras.add(name);
    }
    return this;
  }

  /** 标记可缺省的键；传入 "*" 则全部已声明键都可缺省 */
  allow_optionals(...names: string[]): this {
    for (const name of names) {
      if (name === WILDCARD) this.contracts.forEach((_c, key) => this.optionals.add(key));
      else this.optionals.add(name);
    }
    return this;
  }

  check(value: unknown): void {
    const entries = entries_of(value);
    if (entries === null) this.fail('value is not dict');

    const present = new Set(entries.map(([key]) => key));
    for (const key of this.contracts.keys()) {
      if (!this.optionals.has(key) && !present.has(key)) this.fail(`${key} is required`);
    }

    for (const [key, item] of entries) {
      const name = String(key);
      const contract = typeof key === 'string' ? this.contracts.get(key) : undefined;
      if (contract) {
        this.check_child(name, contract, item);
      } else if (!this.allow_any && !this.extras.has(name)) {
        this.fail(`${name} is not allowed key`);
      }
    }
  }

  describe(): string {
    const options: string[] = [];
    if (this.allow_any) options.push('any');
    if (this.extras.size) options.push(`extras=${format_group(this.extras)}`);
    if (this.optionals.size) options.push(`optionals=${format_group(this.optionals)}`);

    const fields = [...this.contracts.keys()]
      .sort()
      .map((key) => `${key}=${this.contracts.get(key)?.describe()}`);

    const head = options.length ? `${options.join(', ')} | ` : '';
    return `<DictC(${head}${fields.join(', ')})>`;
  }
}
