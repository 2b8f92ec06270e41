import type { Contract } from '../contracts/base';
import type { ValidationError } from '../contracts/errors';

/** 可直接实例化（无参构造）的 contract 类，例如 IntC、StringC */
export type ContractClass = new () => Contract;

/** 普通运行时构造器（Date、Map、String 以及用户自定义类） */
export type RuntimeType = abstract new (...args: never[]) => unknown;

/**
 * 组合 contract 接受的「子 contract」写法：
 * - 已有实例：原样使用
 * - contract 类：无参实例化
 * - 运行时类型：包装为 TypeC
 */
export type ContractLike = Contract | ContractClass | RuntimeType;

/** 不抛异常的校验结果 */
export type CheckResult =
  | { ok: true }
  | { ok: false; error: ValidationError };

/** 数值边界（全部可选） */
export interface NumericBounds {
  /** 大于等于 */
  gte?: number;
  /** 小于等于 */
  lte?: number;
  /** 严格大于 */
  gt?: number;
  /** 严格小于 */
  lt?: number;
}

export interface ListOptions {
  /** 最小长度（默认 0） */
  min_length?: number;
  /** 最大长度（缺省不限制） */
  max_length?: number;
}

/** DictC 的键策略，可在构造时一次给全 */
export interface DictPolicy {
  /** 允许出现但没有声明 contract 的键 */
  extras?: readonly string[];
  /** 允许缺失的已声明键 */
  optionals?: readonly string[];
  /** 允许任意额外键 */
  allow_any?: boolean;
}
