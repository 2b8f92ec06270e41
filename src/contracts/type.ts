import type { RuntimeType } from '../types';
import { Contract } from './base';
import { ConfigurationError } from './errors';

/** 包装类与对应的原始类型：new TypeC(String) 同时接受 'x' 与 new String('x') */
const PRIMITIVE_OF = new Map<RuntimeType, string>([
  [String, 'string'],
  [Number, 'number'],
  [Boolean, 'boolean'],
]);

/**
 * 运行时类型检查（instanceof，包含子类）。
 *
 * @example
 * new TypeC(Date).check(new Date()); // ok
 * new TypeC(Date).check('2020');     // value is not Date
 */
export class TypeC extends Contract {
  constructor(readonly type_: RuntimeType) {
    super();
    // 无参实例化（如 new ListC(TypeC)）时 type_ 为 undefined
    const candidate: unknown = type_;
    if (typeof candidate !== 'function') {
      throw new ConfigurationError('TypeC argument should be a type');
    }
  }

  check(value: unknown): void {
    const primitive = PRIMITIVE_OF.get(this.type_);
    if (primitive !== undefined && typeof value === primitive) return;
    if (!(value instanceof this.type_)) {
      this.fail(`value is not ${this.type_.name}`);
    }
  }

  describe(): string {
    return `<type(${this.type_.name})>`;
  }
}

export class AnyC extends Contract {
  check(_value: unknown): void {
    // 任意值都通过
  }

  describe(): string {
    return 'Any';
  }
}
