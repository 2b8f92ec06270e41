import type { ContractLike, ListOptions } from '../types';
import { ListOptionsSchema, parse_options } from '../schema/options.schema';
import { Contract } from './base';
import { to_contract } from './normalize';

/**
 * 同构列表：长度限制 + 元素 contract。
 * 元素按下标顺序校验，遇到第一个失败的元素即停止，路径为 "<index>" 或 "<index>.<子路径>"。
 */
export class ListC extends Contract {
  readonly contract: Contract;
  readonly min_length: number;
  readonly max_length?: number;

  constructor(contract: ContractLike, options: ListOptions = {}) {
    super();
    this.contract = to_contract(contract);
    const parsed = parse_options('ListC', ListOptionsSchema, options);
    this.min_length = parsed.min_length;
    this.max_length = parsed.max_length;
  }

  check(value: unknown): void {
    if (!Array.isArray(value)) this.fail('value is not list');
    if (value.length < this.min_length) {
      this.fail(`list length is less than ${this.min_length}`);
    }
    if (this.max_length !== undefined && value.length > this.max_length) {
      this.fail(`list length is greater than ${this.max_length}`);
    }
    // 下标循环：稀疏数组的空位按 undefined 校验
    for (let index = 0; index < value.length; index++) {
      const item: unknown = value[index];
      this.check_child(String(index), this.contract, item);
    }
  }

  describe(): string {
    const options: string[] = [];
    if (this.min_length > 0) options.push(`minimum length of ${this.min_length}`);
    if (this.max_length !== undefined) options.push(`maximum length of ${this.max_length}`);
    const head = `List of ${this.contract.describe()}`;
    return options.length ? `${head} (${options.join(', ')})` : head;
  }
}
