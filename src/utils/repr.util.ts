/**
 * 把字面量渲染成描述/路径里使用的文本：
 *   "bar" -> 'bar'    2 -> 2    null -> null
 * 字符串用单引号，内部的单引号与反斜杠转义；其他原始值直接 String()；
 * 对象与数组走 JSON（无法序列化时退回 String()）。
 */
export function format_literal(value: unknown): string {
  if (typeof value === 'string') {
    return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
  }
  if (value === null || value === undefined) return String(value);
  if (typeof value === 'function') return value.name || 'anonymous';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value) ?? String(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

/** 「(a, b, c)」形式的列表 */
export function format_group(items: Iterable<string>): string {
  return `(${[...items].join(', ')})`;
}
