import { isDeepStrictEqual } from 'node:util';
import { format_literal } from '../utils/repr.util';
import { Contract } from './base';

/** 枚举：值与某个候选按值相等（深比较，不比引用） */
export class EnumC extends Contract {
  readonly variants: readonly unknown[];

  constructor(...variants: unknown[]) {
    super();
    this.variants = [...variants];
  }

  check(value: unknown): void {
    if (!this.variants.some((variant) => isDeepStrictEqual(variant, value))) {
      this.fail("value doesn't match any variant");
    }
  }

  describe(): string {
    return this.variants.map(format_literal).join(' or ');
  }
}
