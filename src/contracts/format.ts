import { domainToASCII } from 'node:url';
import { z } from 'zod';
import { format_literal } from '../utils/repr.util';
import { Contract } from './base';

/** 本地部分：dot-atom 或 quoted-string */
const LOCAL_PART =
  "(?:[-!#$%&'*+/=?^_`{}|~0-9A-Z]+(?:\\.[-!#$%&'*+/=?^_`{}|~0-9A-Z]+)*" +
  '|"(?:[\\x01-\\x08\\x0b\\x0c\\x0e-\\x1f!#-\\[\\]-\\x7f]|\\\\[\\x01-\\x09\\x0b\\x0c\\x0e-\\x7f])*")';

/** 域名部分：主机名（TLD 允许 punycode 形式），或 [IPv4] 字面量 */
const OCTET = '(?:25[0-5]|2[0-4]\\d|[0-1]?\\d?\\d)';
const DOMAIN =
  '(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\\.)+(?:[A-Z]{2,63}|XN--[A-Z0-9-]{1,59})\\.?' +
  `|\\[${OCTET}(?:\\.${OCTET}){3}\\])`;

export const EMAIL_RE = new RegExp(`^${LOCAL_PART}@${DOMAIN}$`, 'i');

/**
 * e-mail 地址。
 * 先直接匹配；失败时把 @ 之后的国际化域名转成 ASCII（punycode）再匹配一次。
 */
export class EmailC extends Contract {
  check(value: unknown): void {
    if (typeof value !== 'string' || value.length === 0) this.fail('value is not email');
    if (EMAIL_RE.test(value)) return;

    const at = value.lastIndexOf('@');
    if (at > 0) {
      const ascii = domainToASCII(value.slice(at + 1));
      if (ascii && EMAIL_RE.test(`${value.slice(0, at)}@${ascii}`)) return;
    }
    this.fail('value is not email');
  }

  describe(): string {
    return 'String with email format';
  }
}

/** YYYY-MM-DD，或带时间（可带时区偏移，也可不带）的 ISO-8601 字符串 */
const IsoDateString = z.union([
  z.string().date(),
  z.string().datetime({ offset: true, local: true }),
]);

export class IsoDateC extends Contract {
  check(value: unknown): void {
    if (!IsoDateString.safeParse(value).success) {
      this.fail(`value is not an iso formatted date: ${format_literal(value)}`);
    }
  }

  describe(): string {
    return 'ISO formatted date';
  }
}
