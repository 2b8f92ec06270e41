/**
 * 校验失败：一条消息 + 可选路径（如 "children.0.name"）。
 *
 * - 叶子 contract 只给消息，不知道自己在结构中的位置；
 * - 路径由外层组合 contract 在向上抛出时逐级加前缀（with_prefix）；
 * - 实例不可变：加前缀返回新的错误对象。
 */
export class ValidationError extends Error {
  /** 点号/下标路径；叶子抛出时为空 */
  public readonly path?: string;
  /** 各分支的失败原因（目前只有 OrC 会填充） */
  public readonly causes: readonly ValidationError[];

  constructor(message: string, path?: string, causes: readonly ValidationError[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.path = path;
    this.causes = causes;
  }

  /** 带路径的完整描述，例如 "bar: value is not string" */
  get located(): string {
    return this.path ? `${this.path}: ${this.message}` : this.message;
  }

  /** 以 prefix 作为最外层路径段，返回新的错误 */
  with_prefix(prefix: string): ValidationError {
    return new ValidationError(this.message, join_path(prefix, this.path), this.causes);
  }
}

/**
 * guard 包装函数的参数校验失败。
 * 与 ValidationError 同消息同路径，方便调用方区分「调用参数不对」与「业务内部校验失败」。
 */
export class GuardValidationError extends ValidationError {
  constructor(source: ValidationError) {
    super(source.message, source.path, source.causes);
    this.name = 'GuardValidationError';
  }
}

/** 构建 contract 树时的编程错误（参数非法、重复绑定等），不携带路径 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function join_path(prefix: string, path?: string): string {
  return path ? `${prefix}.${path}` : prefix;
}
