/**
 * 🧮 邊界條件組合矩陣生成器
 *
 * 由少量基礎 BC token 與顯式列出的例外組合，生成三軸 BC 配置的完整列舉：
 *   - planar: 基礎 token 與自身的笛卡兒積 (有序對)
 *   - xy:     planar + 共用例外 (週期性邊界)
 *   - z:      xy + Z 專用例外 (2-D 退化軸)
 *
 * 列舉順序固定為 X 外層、Y 中層、Z 內層，測試序號 (1-based) 因此可重現。
 */

import type {
  AxisBCPair,
  AxisPairSets,
  BCConfiguration,
  BCToken,
  MatrixOptions,
  Resolution,
  TestCase
} from '../../types/index';

// === 例外組合清單 ===

/** 基礎 BC 類型 */
export const BASE_BC_TOKENS: readonly BCToken[] = ['0', '1', '4'];

/** X/Y/Z 都可用、但無法由基礎集合推出的組合 (週期性邊界) */
export const SHARED_EXCEPTION_PAIRS: readonly AxisBCPair[] = [['3', '3']];

/** 僅 Z 軸可用：2-D 退化配置，該軸解析度強制為 1 */
export const Z_ONLY_EXCEPTION_PAIRS: readonly AxisBCPair[] = [['9', '9']];

export const DEFAULT_GRID_SIZE = 8;

const GREEN_TYPE = 0;

// === 軸向集合 ===

function pairKey(pair: AxisBCPair): string {
  return `${pair[0]}|${pair[1]}`;
}

function containsPair(pairs: readonly AxisBCPair[], pair: AxisBCPair): boolean {
  const key = pairKey(pair);
  return pairs.some(p => pairKey(p) === key);
}

function appendExceptions(
  base: readonly AxisBCPair[],
  exceptions: readonly AxisBCPair[],
  label: string
): AxisBCPair[] {
  const result = [...base];
  for (const pair of exceptions) {
    if (containsPair(result, pair)) {
      throw new Error(`${label} 例外組合重複: (${pair[0]}, ${pair[1]})`);
    }
    result.push(pair);
  }
  return result;
}

/**
 * 建立三組軸向 BC 集合
 */
export function buildAxisPairSets(
  baseTokens: readonly BCToken[] = BASE_BC_TOKENS,
  sharedExceptions: readonly AxisBCPair[] = SHARED_EXCEPTION_PAIRS,
  zOnlyExceptions: readonly AxisBCPair[] = Z_ONLY_EXCEPTION_PAIRS
): AxisPairSets {
  if (baseTokens.length === 0) {
    throw new Error('基礎 BC token 集合不能為空');
  }
  if (new Set(baseTokens).size !== baseTokens.length) {
    throw new Error(`基礎 BC token 重複: ${baseTokens.join(',')}`);
  }

  const planar: AxisBCPair[] = [];
  for (const low of baseTokens) {
    for (const high of baseTokens) {
      planar.push([low, high]);
    }
  }

  const xy = appendExceptions(planar, sharedExceptions, '共用');
  const z = appendExceptions(xy, zOnlyExceptions, 'Z 專用');

  return { planar, xy, z };
}

/**
 * 列舉 xy × xy × z 的所有配置
 */
export function enumerateConfigurations(sets: AxisPairSets): BCConfiguration[] {
  const configs: BCConfiguration[] = [];
  for (const x of sets.xy) {
    for (const y of sets.xy) {
      for (const z of sets.z) {
        configs.push({ x, y, z });
      }
    }
  }
  return configs;
}

/** 預期矩陣大小 |xy|² × |z| */
export function matrixSize(sets: AxisPairSets): number {
  return sets.xy.length * sets.xy.length * sets.z.length;
}

// === TestCase 衍生欄位 ===

export function identityCode(bc: BCConfiguration): string {
  return [bc.x[0], bc.x[1], bc.y[0], bc.y[1], bc.z[0], bc.z[1]].join('');
}

export function resultFileName(code: string): string {
  return `validation_3d_${code}_typeGreen=${GREEN_TYPE}.txt`;
}

export function isDegenerateZ(
  bc: BCConfiguration,
  zOnlyExceptions: readonly AxisBCPair[] = Z_ONLY_EXCEPTION_PAIRS
): boolean {
  return containsPair(zOnlyExceptions, bc.z);
}

export function resolutionFor(
  bc: BCConfiguration,
  gridSize: number = DEFAULT_GRID_SIZE,
  zOnlyExceptions: readonly AxisBCPair[] = Z_ONLY_EXCEPTION_PAIRS
): Resolution {
  return isDegenerateZ(bc, zOnlyExceptions)
    ? [gridSize, gridSize, 1]
    : [gridSize, gridSize, gridSize];
}

/**
 * 🏭 生成完整的 TestCase 序列
 */
export function generateTestCases(options: MatrixOptions = {}): TestCase[] {
  const {
    baseTokens = BASE_BC_TOKENS,
    sharedExceptions = SHARED_EXCEPTION_PAIRS,
    zOnlyExceptions = Z_ONLY_EXCEPTION_PAIRS,
    gridSize = DEFAULT_GRID_SIZE
  } = options;

  if (!Number.isInteger(gridSize) || gridSize < 1) {
    throw new Error(`網格大小必須為正整數: ${gridSize}`);
  }

  const sets = buildAxisPairSets(baseTokens, sharedExceptions, zOnlyExceptions);
  const seen = new Set<string>();

  return enumerateConfigurations(sets).map((bc, i) => {
    const code = identityCode(bc);
    // 多字元 token 可能讓不同配置串接出相同代碼
    if (seen.has(code)) {
      throw new Error(`配置代碼重複: ${code}`);
    }
    seen.add(code);

    return {
      index: i + 1,
      bc,
      resolution: resolutionFor(bc, gridSize, zOnlyExceptions),
      code,
      resultFile: resultFileName(code)
    };
  });
}
