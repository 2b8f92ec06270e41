import type { ValidationIssue } from '../types';

export * from './definition.schema';
export * from './options.schema';

/** 构造统一的问题对象（编译器/运行器复用） */
export function issue(
  code: string,
  path: string,
  message: string,
  hint?: string
): ValidationIssue {
  return hint === undefined ? { code, path, message } : { code, path, message, hint };
}
