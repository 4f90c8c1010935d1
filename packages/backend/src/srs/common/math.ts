/**
 * 数值工具
 */

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * 算术平均，空数组返回 fallback
 */
export function mean(values: readonly number[], fallback = 0): number {
  if (values.length === 0) {
    return fallback;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * 四舍六入五成双（银行家舍入）
 *
 * 会话大小的取整沿用此规则：10.5 → 10，11.5 → 12
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}
