/**
 * 🔢 數值比較工具
 *
 * 結果檔解析與容差比較共用的檢查函數
 */

import numeric from 'numeric';

export namespace NumericalSafety {

  /**
   * 檢查數值是否有效（非 NaN 且有限）
   */
  export function isValidNumber(value: number): boolean {
    return isFinite(value) && !isNaN(value);
  }

  /**
   * 解析數值字串；無法解析或非有限值時返回 null
   */
  export function parseFinite(text: string): number | null {
    if (text.trim() === '') {
      return null;
    }
    const value = Number(text);
    return isValidNumber(value) ? value : null;
  }

  /**
   * 相對容差檢查
   */
  export function isNearlyEqual(a: number, b: number, relativeTolerance: number = 1e-9, absoluteTolerance: number = 1e-15): boolean {
    if (!isValidNumber(a) || !isValidNumber(b)) {
      return false;
    }

    const diff = Math.abs(a - b);
    const maxValue = Math.max(Math.abs(a), Math.abs(b));

    return diff <= absoluteTolerance || diff <= relativeTolerance * maxValue;
  }

  /**
   * 兩向量差的無窮範數
   */
  export function maxAbsDifference(actual: number[], expected: number[]): number {
    if (actual.length !== expected.length) {
      throw new Error(`向量長度不一致: ${actual.length} vs ${expected.length}`);
    }
    if (actual.length === 0) {
      return 0;
    }
    return numeric.norminf(numeric.sub(actual, expected));
  }
}
