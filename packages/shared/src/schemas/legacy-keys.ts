/**
 * 旧版文档字段兼容
 *
 * 早期版本以 snake_case 写入 vocab_progress.json 与 session_counter.json，
 * 读取时映射到当前字段名；两者同时存在时以当前字段为准
 */

export function renameLegacyKeys(raw: unknown, aliases: Readonly<Record<string, string>>): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }

  const value: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  for (const [legacy, current] of Object.entries(aliases)) {
    if (Object.hasOwn(value, legacy) && !Object.hasOwn(value, current)) {
      value[current] = value[legacy];
    }
  }
  return value;
}
