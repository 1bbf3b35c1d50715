/**
 * StepCode - Zod契约
 * 步骤代码是 3 个字符的外部标识，用于定位已产生的数据，与步骤序号不属于同一命名空间
 */

import { z } from 'zod';

/** 单个步骤代码，按字符（码点）计数 */
export const StepCodeSchema = z
  .string()
  .refine((code) => [...code].length === 3, {
    message: 'Step code must be exactly 3 characters',
  })
  .brand<'StepCode'>();

/** 步骤代码类型（运行时就是 string） */
export type StepCode = z.infer<typeof StepCodeSchema>;

/** 单个代码或代码列表 */
export const StepCodeListSchema = z.union([
  StepCodeSchema.transform((code) => [code]),
  z.array(StepCodeSchema),
]);

/**
 * 判断给定值是否为合法的步骤代码
 * @param value 待检查的值
 * @returns 是否合法
 */
export function isStepCode(value: unknown): value is StepCode {
  return StepCodeSchema.safeParse(value).success;
}
