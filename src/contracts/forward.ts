import type { ContractLike } from '../types';
import { Contract } from './base';
import { ConfigurationError } from './errors';
import { to_contract } from './normalize';

/**
 * 前向声明：先占位，之后只允许绑定一次目标 contract，用来描述递归结构。
 *
 * @example
 * const node = new ForwardC();
 * node.define(new DictC({ name: StringC, children: new ListC(node) }));
 * node.describe(); // <ForwardC(<DictC(children=List of <recur>, name=String)>)>
 */
export class ForwardC extends Contract {
  private target?: Contract;
  /** 描述进行中标记，遇到环时输出 <recur> */
  private describing = false;

  get is_defined(): boolean {
    return this.target !== undefined;
  }

  define(contract: ContractLike): this {
    if (this.target) {
      throw new ConfigurationError('contract for ForwardC is already specified');
    }
    this.target = to_contract(contract);
    return this;
  }

  check(value: unknown): void {
    if (!this.target) {
      throw new ConfigurationError('contract for ForwardC is not specified');
    }
    this.target.check(value);
  }

  describe(): string {
    if (this.describing) return '<recur>';
    this.describing = true;
    try {
      return `<ForwardC(${this.target ? this.target.describe() : 'undefined'})>`;
    } finally {
      this.describing = false;
    }
  }
}
