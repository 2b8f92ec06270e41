/** 仅认普通对象：原型为 Object.prototype 或 null（排除数组、Date、类实例等） */
export function is_plain_object(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * 把「映射类」值统一成键值对列表：
 * - Map：按插入顺序
 * - 普通对象：Object.entries 的顺序
 * - 其他：null（调用方据此报 "value is not ..."）
 */
export function entries_of(value: unknown): Array<[unknown, unknown]> | null {
  if (value instanceof Map) return [...value.entries()];
  if (is_plain_object(value)) return Object.entries(value);
  return null;
}
