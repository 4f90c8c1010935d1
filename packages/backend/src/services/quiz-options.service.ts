/**
 * 选择题选项生成
 *
 * 正确答案 + 从词库随机抽取的不重复干扰项；抽取次数有上限，
 * 凑不满 4 个时按实际数量出题（至少包含正确答案）
 */

import { QUIZ_MAX_DRAWS, QUIZ_OPTION_COUNT } from '../config/scheduling';
import { pickOne, shuffle, type RandomSource } from '../srs';

export interface QuizOptionSettings {
  optionCount?: number;
  maxDraws?: number;
}

export function buildQuizOptions(
  correctAnswer: string,
  translations: readonly string[],
  random: RandomSource,
  settings: QuizOptionSettings = {},
): string[] {
  const optionCount = settings.optionCount ?? QUIZ_OPTION_COUNT;
  const maxDraws = settings.maxDraws ?? QUIZ_MAX_DRAWS;

  const options = [correctAnswer];
  let draws = 0;
  while (options.length < optionCount && draws < maxDraws) {
    const candidate = pickOne(translations, random);
    if (candidate !== undefined && !options.includes(candidate)) {
      options.push(candidate);
    }
    draws += 1;
  }

  return shuffle(options, random);
}
