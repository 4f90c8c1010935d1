/**
 * 可注入的伪随机数源
 *
 * 选词洗牌和干扰项抽取都通过 RandomSource 取随机数，
 * 传入固定种子即可得到可复现的结果
 */

import seedrandom from 'seedrandom';

export interface RandomSource {
  /** 返回 [0,1) 区间的随机数 */
  next(): number;
}

/**
 * 创建随机数源
 * @param seed 种子；省略时使用自动种子
 */
export function createRandomSource(seed?: string): RandomSource {
  const prng = seed === undefined ? seedrandom() : seedrandom(seed);
  return {
    next: () => prng(),
  };
}

/**
 * Fisher-Yates 洗牌，返回新数组
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random.next() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * 随机取一个元素，空数组返回 undefined
 */
export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[Math.floor(random.next() * items.length)];
}
