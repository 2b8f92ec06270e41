import type { Contract } from '../contracts/base';
import type { ValidationIssue } from './issue.type';

/** ---------------------------
 *  编译阶段（输入 / 诊断 / 输出）
 * ---------------------------*/

/** 编译入口参数 */
export interface CompileInput {
  /** contract 定义文档（已解析为 JS 对象；通常来自 JSON 文件）。 */
  definition: unknown;
  /** 编译选项（可选）。 */
  options?: {
    /**
     * 严格模式：为 true 时 warnings 一并升级为 errors。
     * 典型用途：CI 门禁。
     */
    strict?: boolean;
  };
}

/** 编译输出（含成功/失败两种分支） */
export interface CompileOutput {
  /** 是否编译成功（成功时 errors 为空；warnings 可能非空）。 */
  ok: boolean;
  /** 成功时给出根 contract；失败为 null。 */
  contract: Contract | null;
  /** 具名定义（每个都是已绑定的 ForwardC）；失败为空对象。 */
  definitions: Record<string, Contract>;
  /** 致命错误列表（失败原因）。 */
  errors: ValidationIssue[];
  /** 非致命告警列表。 */
  warnings: ValidationIssue[];
  /** 编译耗时（毫秒）。 */
  time_ms: number;
}
