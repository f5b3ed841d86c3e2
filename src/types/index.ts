/**
 * 🎯 邊界條件驗證框架 - 核心類型定義
 *
 * 描述 BC 組合矩陣、求解器執行結果與彙總報告
 */

// 基礎類型
export type BCToken = string;
export type AxisName = 'x' | 'y' | 'z';

/** 單一軸向的 (低端, 高端) 邊界條件 */
export type AxisBCPair = readonly [low: BCToken, high: BCToken];

/** 每軸網格點數 [nx, ny, nz] */
export type Resolution = readonly [nx: number, ny: number, nz: number];

// === 矩陣相關類型 ===

export interface AxisPairSets {
  /** 基礎 token 的笛卡兒自積 */
  readonly planar: readonly AxisBCPair[];
  /** X/Y 軸可用集合 (planar + 共用例外) */
  readonly xy: readonly AxisBCPair[];
  /** Z 軸可用集合 (xy + Z 專用例外) */
  readonly z: readonly AxisBCPair[];
}

export interface BCConfiguration {
  readonly x: AxisBCPair;
  readonly y: AxisBCPair;
  readonly z: AxisBCPair;
}

export interface TestCase {
  /** 1-based 序號，跨次執行保持穩定 */
  readonly index: number;
  readonly bc: BCConfiguration;
  readonly resolution: Resolution;
  /** 六個 BC token 依 x-low, x-high, y-low, y-high, z-low, z-high 串接 */
  readonly code: string;
  readonly resultFile: string;
}

export interface MatrixOptions {
  baseTokens?: readonly BCToken[];
  sharedExceptions?: readonly AxisBCPair[];
  zOnlyExceptions?: readonly AxisBCPair[];
  gridSize?: number;
}

// === 求解器執行 ===

export interface SolverRun {
  /** 行程結束碼；被信號終止或無法啟動時為 null */
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  launchError?: string;
  /** 輸出超過擷取上限 (bytes) 而被終止 */
  outputLimitExceeded?: number;
  durationMs: number;
}

// === 執行結果分類 ===

export type RunOutcome =
  | {
      kind: 'process_failure';
      exitCode: number | null;
      signal: string | null;
      stdout: string;
      stderr: string;
      timedOut: boolean;
      launchError?: string;
      outputLimitExceeded?: number;
    }
  | { kind: 'numeric_mismatch'; mistakes: number }
  | { kind: 'inconclusive'; reason: string }
  | { kind: 'success' };

export type OutcomeKind = RunOutcome['kind'];

export interface CaseRecord {
  testCase: TestCase;
  outcome: RunOutcome;
  durationMs: number;
}

export interface AggregateReport {
  total: number;
  successes: number;
  failures: number;
  processFailures: number;
  numericMismatches: number;
  inconclusive: number;
  records: CaseRecord[];
  exitCode: number;
  summary: string;
}

// === 結果檔案 ===

/** 求解器每次執行追加一行: "<n> <err2> <errInf>" */
export interface ResultRow {
  n: number;
  err2: number;
  errInf: number;
}

// === 日誌 ===

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}
