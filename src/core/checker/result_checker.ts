/**
 * 📊 結果檢查器
 *
 * 讀取求解器產生的誤差檔，與同名的參考檔逐行比較，返回錯誤數。
 *
 * 檔案格式 (求解器每次執行追加一行)：
 *   <n> <err2> <errInf>
 *
 * 檔案缺失或格式錯誤時拋出 ResultFileError，由執行器歸類為 inconclusive。
 */

import fs from 'fs';
import path from 'path';
import type { Logger, ResultRow } from '../../types/index';
import { NumericalSafety } from '../../math/numerical/safety';

export interface ResultChecker {
  /** 返回數值錯誤數，0 表示通過 */
  check(testIndex: number, filename: string): number;
}

export class ResultFileError extends Error {
  constructor(
    message: string,
    public readonly file: string
  ) {
    super(message);
    this.name = 'ResultFileError';
  }
}

// 每一行參考數據包含兩個受檢值 (err2, errInf)
const VALUES_PER_ROW = 2;

export function parseResultFile(content: string, source: string): ResultRow[] {
  const rows: ResultRow[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, i) => {
    const trimmed = line.trim();
    if (trimmed === '') return;

    const fields = trimmed.split(/\s+/);
    if (fields.length !== 3) {
      throw new ResultFileError(`${source}:${i + 1} 欄位數應為 3，實際為 ${fields.length}`, source);
    }

    const [nText, err2Text, errInfText] = fields;
    const n = NumericalSafety.parseFinite(nText ?? '');
    const err2 = NumericalSafety.parseFinite(err2Text ?? '');
    const errInf = NumericalSafety.parseFinite(errInfText ?? '');

    if (n === null || !Number.isInteger(n) || n < 1) {
      throw new ResultFileError(`${source}:${i + 1} 網格大小無效: ${nText}`, source);
    }
    if (err2 === null || errInf === null) {
      throw new ResultFileError(`${source}:${i + 1} 誤差值無效: ${trimmed}`, source);
    }

    rows.push({ n, err2, errInf });
  });

  return rows;
}

export interface ReferenceCheckerOptions {
  /** 求解器輸出所在目錄 */
  resultDir: string;
  /** 參考檔所在目錄 */
  referenceDir: string;
  relativeTolerance: number;
  absoluteTolerance: number;
  logger?: Logger;
}

export class ReferenceResultChecker implements ResultChecker {
  constructor(private readonly options: ReferenceCheckerOptions) {}

  check(testIndex: number, filename: string): number {
    const produced = this._readRows(path.join(this.options.resultDir, filename));
    const reference = this._readRows(path.join(this.options.referenceDir, filename));

    if (reference.length === 0) {
      throw new ResultFileError(`參考檔沒有數據: ${filename}`, filename);
    }

    // 同一解析度出現多次時以最後一次為準
    const latest = new Map<number, ResultRow>();
    for (const row of produced) {
      latest.set(row.n, row);
    }

    let mistakes = 0;
    let worst = 0;
    const { relativeTolerance, absoluteTolerance } = this.options;

    for (const expected of reference) {
      const actual = latest.get(expected.n);
      if (!actual) {
        mistakes += VALUES_PER_ROW;
        this.options.logger?.debug(`test ${testIndex}: 缺少 n=${expected.n} 的結果`);
        continue;
      }

      const pairs: Array<[number, number]> = [
        [actual.err2, expected.err2],
        [actual.errInf, expected.errInf]
      ];
      for (const [a, e] of pairs) {
        if (!NumericalSafety.isNearlyEqual(a, e, relativeTolerance, absoluteTolerance)) {
          mistakes++;
        }
      }

      worst = Math.max(
        worst,
        NumericalSafety.maxAbsDifference([actual.err2, actual.errInf], [expected.err2, expected.errInf])
      );
    }

    if (mistakes > 0) {
      this.options.logger?.debug(
        `test ${testIndex}: ${filename} 有 ${mistakes} 個數值超出容差 (最大絕對差 ${worst.toExponential(3)})`
      );
    }

    return mistakes;
  }

  private _readRows(file: string): ResultRow[] {
    let content: string;
    try {
      content = fs.readFileSync(file, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ResultFileError(`無法讀取 ${file}: ${reason}`, file);
    }
    return parseResultFile(content, file);
  }
}
