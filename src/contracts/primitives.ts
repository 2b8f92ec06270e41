import { Contract } from './base';

export class NullC extends Contract {
  check(value: unknown): void {
    if (value !== null) this.fail('value should be null');
  }

  describe(): string {
    return 'Null';
  }
}

export class BoolC extends Contract {
  check(value: unknown): void {
    if (typeof value !== 'boolean') this.fail('value should be true or false');
  }

  describe(): string {
    return 'Boolean';
  }
}

/**
 * 字符串；默认不接受空串。
 *
 * @example
 * new StringC().check('');                       // blank value is not allowed
 * new StringC({ allow_blank: true }).check('');  // ok
 */
export class StringC extends Contract {
  readonly allow_blank: boolean;

  constructor(options: { allow_blank?: boolean } = {}) {
    super();
    this.allow_blank = options.allow_blank ?? false;
  }

  check(value: unknown): void {
    if (typeof value !== 'string') this.fail('value is not string');
    if (!this.allow_blank && value.length === 0) this.fail('blank value is not allowed');
  }

  describe(): string {
    return this.allow_blank ? 'String (could be blank)' : 'String';
  }
}

export class CallableC extends Contract {
  check(value: unknown): void {
    if (typeof value !== 'function') this.fail('value is not callable');
  }

  describe(): string {
    return '<callable>';
  }
}
