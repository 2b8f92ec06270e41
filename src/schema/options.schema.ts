import { z } from 'zod';
import { ConfigurationError } from '../contracts/errors';

/**
 * contract 构造参数的结构校验。
 * 失败统一转成 ConfigurationError（编程错误），消息带上 contract 名与字段路径。
 */

const Bound = z.number().finite('bound must be a finite number').optional();

/** IntC / FloatC 的边界 */
export const NumericBoundsSchema = z
  .object({
    gte: Bound,
    lte: Bound,
    gt: Bound,
    lt: Bound,
  })
  .strict();

const Length = z.number().int('length must be an integer').min(0, 'length must not be negative');

/** ListC 的长度限制 */
export const ListOptionsSchema = z
  .object({
    min_length: Length.default(0),
    max_length: Length.optional(),
  })
  .strict()
  .refine((o) => o.max_length === undefined || o.max_length >= o.min_length, {
    message: 'max_length must not be less than min_length',
    path: ['max_length'],
  });

export type NumericBoundsType = z.output<typeof NumericBoundsSchema>;
export type ListOptionsType = z.output<typeof ListOptionsSchema>;

/** 用 schema 解析构造参数；失败时抛出 ConfigurationError */
export function parse_options<S extends z.ZodTypeAny>(
  owner: string,
  schema: S,
  input: unknown
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length ? ` (${first.path.join('.')})` : '';
    throw new ConfigurationError(`invalid ${owner} options${where}: ${first?.message ?? 'unknown error'}`);
  }
  return result.data;
}
