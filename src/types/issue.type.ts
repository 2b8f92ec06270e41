/** 编译期与校验期问题的统一表示 */
export interface ValidationIssue {
  /** 机器可读错误码（如 SCHEMA_ERROR / UNKNOWN_REF / VALIDATION_ERROR）。 */
  code: string;
  /**
   * 出错位置：
   * - 编译期：定义文档内的 "/" 路径（如 "/definitions/node/fields/children"）
   * - 校验期：被校验值内的点号路径（如 "children.0.name"），根上为空串
   */
  path: string;
  /** 人类可读消息。 */
  message: string;
  /** 可选：修复建议。 */
  hint?: string;
}

/** 对一个值执行一次校验的结果 */
export interface CheckOutput {
  ok: boolean;
  /** 失败时恰好一条；成功时为空 */
  errors: ValidationIssue[];
  time_ms: number;
}
