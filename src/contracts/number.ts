import type { NumericBounds } from '../types';
import { NumericBoundsSchema, parse_options } from '../schema/options.schema';
import { Contract } from './base';
import { ValidationError } from './errors';
import { StringC } from './primitives';

/** 描述中的边界名（顺序即输出顺序） */
const BOUND_LABELS = [
  ['gte', 'greater or equal than'],
  ['lte', 'less or equal than'],
  ['gt', 'greater than'],
  ['lt', 'less than'],
] as const;

/**
 * IntC / FloatC 的公共部分：先判数值种类，再按 gte、lte、lt、gt 的固定顺序检查边界，
 * 命中第一个违反的边界即失败。
 *
 * JS 只有一种 number：这里把「整数」定义为 Number.isInteger 为真的数，其余数（含 NaN、
 * Infinity）都算 float，两者互不接受。
 */
export abstract class NumericC extends Contract {
  readonly gte?: number;
  readonly lte?: number;
  readonly gt?: number;
  readonly lt?: number;

  constructor(bounds: NumericBounds = {}) {
    super();
    const parsed = parse_options(new.target.name, NumericBoundsSchema, bounds);
    this.gte = parsed.gte;
    this.lte = parsed.lte;
    this.gt = parsed.gt;
    this.lt = parsed.lt;
  }

  /** 失败消息里的类型名（int / float） */
  protected abstract kind_name(): string;
  /** 描述里的类型名（Integer / Float） */
  protected abstract label(): string;

  protected abstract accepts_kind(value: number): boolean;

  /** 用给定边界构造同类新实例 */
  abstract with_bounds(bounds: NumericBounds): NumericC;

  bounds(): NumericBounds {
    return { gte: this.gte, lte: this.lte, gt: this.gt, lt: this.lt };
  }

  /** 追加 gt 边界，返回新实例 */
  greater_than(gt: number): NumericC {
    return this.with_bounds({ ...this.bounds(), gt });
  }

  /** 追加 lt 边界，返回新实例 */
  less_than(lt: number): NumericC {
    return this.with_bounds({ ...this.bounds(), lt });
  }

  /** 闭区间 [gte, lte]；任一端可省略 */
  between(gte?: number, lte?: number): NumericC {
    return this.with_bounds({ ...this.bounds(), gte, lte });
  }

  check(value: unknown): void {
    if (typeof value !== 'number' || !this.accepts_kind(value)) {
      this.fail(`value is not ${this.kind_name()}`);
    }
    // 取反比较：NaN 与任何边界比较都为 false，因此不满足任一边界
    if (this.gte !== undefined && !(value >= this.gte)) this.fail(`value is less than ${this.gte}`);
    if (this.lte !== undefined && !(value <= this.lte)) this.fail(`value is greater than ${this.lte}`);
    if (this.lt !== undefined && !(value < this.lt)) this.fail(`value should be less than ${this.lt}`);
    if (this.gt !== undefined && !(value > this.gt)) this.fail(`value should be greater than ${this.gt}`);
  }

  describe(): string {
    const options: string[] = [];
    for (const [key, text] of BOUND_LABELS) {
      const bound = this[key];
      if (bound !== undefined) options.push(`${text} ${bound}`);
    }
    return options.length ? `${this.label()} (${options.join(', ')})` : this.label();
  }
}

/**
 * @example
 * new IntC({ gte: 1, lte: 10 }).describe(); // Integer (greater or equal than 1, less or equal than 10)
 * new IntC().greater_than(5).check(1);      // value should be greater than 5
 */
export class IntC extends NumericC {
  protected kind_name(): string {
    return 'int';
  }

  protected label(): string {
    return 'Integer';
  }

  protected accepts_kind(value: number): boolean {
    return Number.isInteger(value);
  }

  with_bounds(bounds: NumericBounds): IntC {
    return new IntC(bounds);
  }
}

export class FloatC extends NumericC {
  protected kind_name(): string {
    return 'float';
  }

  protected label(): string {
    return 'Float';
  }

  protected accepts_kind(value: number): boolean {
    return !Number.isInteger(value);
  }

  with_bounds(bounds: NumericBounds): FloatC {
    return new FloatC(bounds);
  }
}

/**
 * 「数字」：有限 number，或只含 0-9 的非空字符串（如表单里的 "42"）。
 * 其余字符串报 "value is not a number"，非字符串按 StringC 的消息报错。
 */
export class NumberC extends StringC {
  constructor() {
    super({ allow_blank: false });
  }

  check(value: unknown): void {
    if (value === null || value === undefined) this.fail(`value is ${value}`);
    try {
      super.check(value);
    } catch (err) {
      if (err instanceof ValidationError && typeof value === 'number' && Number.isFinite(value)) return;
      throw err;
    }
    if (typeof value === 'string' && !/^[0-9]+$/.test(value)) this.fail('value is not a number');
  }

  describe(): string {
    return 'Digit';
  }
}
