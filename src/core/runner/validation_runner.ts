/**
 * 🧪 BC 組合驗證執行器
 *
 * 依序對每個 TestCase 呼叫求解器並分類結果：
 *
 *   Pending → Invoked → ProcessFailure
 *                     → Checking → Success | NumericMismatch | Inconclusive
 *
 * - 不重試；單一配置失敗不會中止整體執行
 * - 結果以 fold 累積成 AggregateReport
 * - 行程結束碼 = 失敗總數 (上限 255)，可直接作為 CI 閘門
 */

import fs from 'fs';
import { performance } from 'perf_hooks';
import type {
  AggregateReport,
  CaseRecord,
  Logger,
  RunOutcome,
  SolverRun,
  TestCase
} from '../../types/index';
import type { SolverInvoker } from '../solver/solver_invoker';
import { ResultFileError, type ResultChecker } from '../checker/result_checker';
import { ConsoleLogger } from '../logging/logger';

// 結束碼只有 8 位元，超過 255 會回繞成看似成功的值
export const MAX_EXIT_CODE = 255;

const BANNER_WIDTH = 88;

function banner(title: string): string {
  const label = ` ${title} `;
  const left = Math.floor((BANNER_WIDTH - label.length) / 2);
  return '='.repeat(left) + label + '='.repeat(BANNER_WIDTH - left - label.length);
}

const WARNING_BANNER = new Array<string>(13).fill('/!\\').join(' -- ');

// === 結果分類 ===

export function classifyRun(testCase: TestCase, run: SolverRun, checker: ResultChecker): RunOutcome {
  if (
    run.launchError !== undefined ||
    run.outputLimitExceeded !== undefined ||
    run.timedOut ||
    run.signal !== null ||
    run.exitCode !== 0
  ) {
    return {
      kind: 'process_failure',
      exitCode: run.exitCode,
      signal: run.signal,
      stdout: run.stdout,
      stderr: run.stderr,
      timedOut: run.timedOut,
      ...(run.launchError !== undefined ? { launchError: run.launchError } : {}),
      ...(run.outputLimitExceeded !== undefined ? { outputLimitExceeded: run.outputLimitExceeded } : {})
    };
  }

  let mistakes: number;
  try {
    mistakes = checker.check(testCase.index, testCase.resultFile);
  } catch (error) {
    if (error instanceof ResultFileError) {
      return { kind: 'inconclusive', reason: error.message };
    }
    throw error;
  }

  if (!Number.isInteger(mistakes) || mistakes < 0) {
    throw new Error(`檢查器返回無效的錯誤數: ${mistakes} (test ${testCase.index})`);
  }

  return mistakes === 0 ? { kind: 'success' } : { kind: 'numeric_mismatch', mistakes };
}

// === 累積 ===

export function emptyReport(): AggregateReport {
  return {
    total: 0,
    successes: 0,
    failures: 0,
    processFailures: 0,
    numericMismatches: 0,
    inconclusive: 0,
    records: [],
    exitCode: 0,
    summary: summaryLine(0, 0)
  };
}

export function exitCodeFor(failures: number): number {
  return Math.min(failures, MAX_EXIT_CODE);
}

export function summaryLine(successes: number, total: number): string {
  return `${successes} test succeeded out of ${total}`;
}

export function foldOutcome(report: AggregateReport, record: CaseRecord): AggregateReport {
  const kind = record.outcome.kind;
  const successes = report.successes + (kind === 'success' ? 1 : 0);
  const failures = report.failures + (kind === 'success' ? 0 : 1);
  const total = report.total + 1;

  return {
    total,
    successes,
    failures,
    processFailures: report.processFailures + (kind === 'process_failure' ? 1 : 0),
    numericMismatches: report.numericMismatches + (kind === 'numeric_mismatch' ? 1 : 0),
    inconclusive: report.inconclusive + (kind === 'inconclusive' ? 1 : 0),
    records: [...report.records, record],
    exitCode: exitCodeFor(failures),
    summary: summaryLine(successes, total)
  };
}

// === 序號篩選 ===

/**
 * 依 1-based 序號篩選，保留原序號；未指定時返回全部
 */
export function selectTestCases(
  testCases: readonly TestCase[],
  only: readonly number[] = []
): readonly TestCase[] {
  if (only.length === 0) {
    return testCases;
  }

  const wanted = new Set(only);
  const known = new Set(testCases.map(t => t.index));
  for (const index of wanted) {
    if (!known.has(index)) {
      throw new Error(`測試序號不存在: ${index} (共 ${testCases.length} 個配置)`);
    }
  }
  return testCases.filter(t => wanted.has(t.index));
}

// === 執行器 ===

export interface ValidationRunnerOptions {
  /** 僅執行這些序號 (1-based)，序號不重新編排 */
  only?: readonly number[];
  /** 若指定則寫出 JSON 報告 */
  reportFile?: string | null;
  logger?: Logger;
}

export class ValidationRunner {
  private readonly logger: Logger;

  constructor(
    private readonly invoker: SolverInvoker,
    private readonly checker: ResultChecker,
    private readonly options: ValidationRunnerOptions = {}
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
  }

  /**
   * 🚀 依序執行所有 TestCase
   */
  run(testCases: readonly TestCase[]): AggregateReport {
    const selected = selectTestCases(testCases, this.options.only);

    const report = selected.reduce((acc, testCase) => {
      const record = this.runCase(testCase);
      return foldOutcome(acc, record);
    }, emptyReport());

    if (report.inconclusive > 0) {
      this.logger.warn(`${report.inconclusive} 個配置無法判定 (結果檔缺失或格式錯誤)，已計為失敗`);
    }
    this.logger.info(report.summary);

    if (this.options.reportFile) {
      this._saveReport(this.options.reportFile, report);
    }

    return report;
  }

  /**
   * 報告寫出失敗只記錄錯誤，結束碼仍反映配置失敗數
   */
  private _saveReport(reportFile: string, report: AggregateReport): void {
    try {
      fs.writeFileSync(reportFile, JSON.stringify(report, null, 2));
      this.logger.debug(`詳細報告已保存到: ${reportFile}`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`無法寫出報告 ${reportFile}: ${reason}`);
    }
  }

  /**
   * 執行並記錄單一 TestCase
   */
  runCase(testCase: TestCase): CaseRecord {
    const start = performance.now();
    const run = this.invoker.run(testCase);
    const outcome = classifyRun(testCase, run, this.checker);
    const record: CaseRecord = { testCase, outcome, durationMs: performance.now() - start };

    this._logOutcome(testCase, outcome);
    return record;
  }

  private _logOutcome(testCase: TestCase, outcome: RunOutcome): void {
    const prefix = `test ${testCase.index} (BCs : ${testCase.code})`;

    switch (outcome.kind) {
      case 'success':
        this.logger.info(`${prefix} succeeded`);
        break;

      case 'numeric_mismatch':
        this.logger.info(`${prefix} failed with wrong values.`);
        this.logger.info(WARNING_BANNER + '\n');
        break;

      case 'inconclusive':
        this.logger.info(`${prefix} inconclusive: ${outcome.reason}`);
        break;

      case 'process_failure':
        this.logger.info(`${prefix} ${describeProcessFailure(outcome)}`);
        this.logger.info(banner('STDOUT'));
        this.logger.info(outcome.stdout);
        this.logger.info(banner('STDERR'));
        this.logger.info(outcome.stderr);
        this.logger.info(banner('======') + '\n');
        break;
    }
  }
}

export function describeProcessFailure(
  outcome: Extract<RunOutcome, { kind: 'process_failure' }>
): string {
  if (outcome.launchError !== undefined) {
    return `could not be run: ${outcome.launchError}`;
  }
  if (outcome.outputLimitExceeded !== undefined) {
    return `output exceeded ${outcome.outputLimitExceeded} bytes`;
  }
  if (outcome.timedOut) {
    return 'timed out';
  }
  if (outcome.signal !== null) {
    return `killed by signal ${outcome.signal}`;
  }
  return `failed with error code ${outcome.exitCode}`;
}
