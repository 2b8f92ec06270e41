import { z } from 'zod';

/**
 * contract 定义文档的结构校验（不做引用解析等语义检查，那些在 compiler 里做）。
 *
 * 文档形如：
 *   { "definitions": { "node": { ... } }, "root": { "type": "ref", "name": "node" } }
 */

/** 定义节点（递归） */
export type ContractNodeType =
  | { type: 'any' | 'null' | 'bool' | 'number' | 'email' | 'iso_date' | 'callable' }
  | { type: 'int' | 'float'; gte?: number; lte?: number; gt?: number; lt?: number }
  | { type: 'string'; allow_blank?: boolean }
  | { type: 'enum'; values: unknown[] }
  | { type: 'or'; any_of: ContractNodeType[] }
  | { type: 'list'; of: ContractNodeType; min_length?: number; max_length?: number }
  | {
      type: 'dict';
      fields: Record<string, ContractNodeType>;
      optional?: string[];
      extras?: string[];
      allow_any?: boolean;
    }
  | { type: 'mapping'; keys: ContractNodeType; values: ContractNodeType }
  | { type: 'ref'; name: string };

/** 无参数的叶子类型 */
export const SIMPLE_TYPES = ['any', 'null', 'bool', 'number', 'email', 'iso_date', 'callable'] as const;

export const ContractNode: z.ZodType<ContractNodeType> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.enum(SIMPLE_TYPES) }).strict(),

    /** 整数/浮点，可带边界 */
    z
      .object({
        type: z.enum(['int', 'float']),
        gte: z.number().optional(),
        lte: z.number().optional(),
        gt: z.number().optional(),
        lt: z.number().optional(),
      })
      .strict(),

    z.object({ type: z.literal('string'), allow_blank: z.boolean().optional() }).strict(),

    z
      .object({
        type: z.literal('enum'),
        values: z.array(z.unknown()).min(1, 'enum 至少需要一个候选值'),
      })
      .strict(),

    z.object({ type: z.literal('or'), any_of: z.array(ContractNode) }).strict(),

    z
      .object({
        type: z.literal('list'),
        of: ContractNode,
        min_length: z.number().optional(),
        max_length: z.number().optional(),
      })
      .strict(),

    /**
     * 对象：
     * - fields：键 → 定义
     * - optional：可缺省的键（"*" 表示全部）
     * - extras：允许出现但不校验的额外键
     * - allow_any：允许任意额外键
     */
    z
      .object({
        type: z.literal('dict'),
        fields: z.record(z.string(), ContractNode),
        optional: z.array(z.string()).optional(),
        extras: z.array(z.string()).optional(),
        allow_any: z.boolean().optional(),
      })
      .strict(),

    z.object({ type: z.literal('mapping'), keys: ContractNode, values: ContractNode }).strict(),

    /** 引用 definitions 中的具名定义（可自引用） */
    z.object({ type: z.literal('ref'), name: z.string().min(1, 'ref name 不能为空') }).strict(),
  ])
);

export const DefinitionDocument = z
  .object({
    /** 具名定义，可互相引用/自引用 */
    definitions: z.record(z.string(), ContractNode).optional(),
    /** 根定义 */
    root: ContractNode,
  })
  .strict();

export type DefinitionDocumentType = z.infer<typeof DefinitionDocument>;

/** 安全解析定义文档：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_definition(input: unknown) {
  return DefinitionDocument.safeParse(input);
}
