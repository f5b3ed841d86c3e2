/**
 * 🚀 求解器呼叫
 *
 * 以同步方式執行外部求解器，每個 TestCase 一次：
 *   <exe> -res <nx> <ny> <nz> -bc <xl> <xh> <yl> <yh> <zl> <zh>
 *
 * 逾時為顯式參數，預設 null (不設限)。不設限時，卡住的求解器會讓整個驗證卡住。
 * 輸出擷取上限同樣預設 null (不設限)；設定後超出上限的求解器會被終止。
 */

import { spawnSync, type SpawnSyncOptionsWithStringEncoding, type SpawnSyncReturns } from 'child_process';
import path from 'path';
import { performance } from 'perf_hooks';
import type { Logger, SolverRun, TestCase } from '../../types/index';

/** 上游提供的兩種求解器建置 (非阻塞 / all-to-all 通訊) */
export const SOLVER_EXECUTABLES = {
  nb: './flups_validation_nb',
  a2a: './flups_validation_a2a'
} as const;

export type SolverVariant = keyof typeof SOLVER_EXECUTABLES;

export function isSolverVariant(value: string): value is SolverVariant {
  return Object.prototype.hasOwnProperty.call(SOLVER_EXECUTABLES, value);
}

export interface SolverInvoker {
  run(testCase: TestCase): SolverRun;
}

export function buildSolverArgs(testCase: TestCase): string[] {
  const { bc, resolution } = testCase;
  return [
    '-res',
    ...resolution.map(n => String(n)),
    '-bc',
    bc.x[0], bc.x[1],
    bc.y[0], bc.y[1],
    bc.z[0], bc.z[1]
  ];
}

export type SpawnFn = (
  command: string,
  args: string[],
  options: SpawnSyncOptionsWithStringEncoding
) => SpawnSyncReturns<string>;

export interface ProcessSolverOptions {
  executable: string;
  cwd: string;
  /** null 表示不設逾時 */
  timeoutMs: number | null;
  /** stdout/stderr 各自的擷取上限 (bytes)；null 表示不設限 */
  maxOutputBytes?: number | null;
  logger?: Logger;
  spawn?: SpawnFn;
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export class ProcessSolverInvoker implements SolverInvoker {
  private readonly spawn: SpawnFn;

  constructor(private readonly options: ProcessSolverOptions) {
    this.spawn = options.spawn ?? spawnSync;
  }

  get executablePath(): string {
    return path.resolve(this.options.cwd, this.options.executable);
  }

  run(testCase: TestCase): SolverRun {
    const args = buildSolverArgs(testCase);
    this.options.logger?.debug(`執行 ${this.options.executable} ${args.join(' ')}`);

    const maxOutputBytes = this.options.maxOutputBytes ?? null;
    const start = performance.now();
    const result = this.spawn(this.executablePath, args, {
      cwd: this.options.cwd,
      encoding: 'utf-8',
      timeout: this.options.timeoutMs ?? undefined,
      maxBuffer: maxOutputBytes ?? Infinity,
      stdio: ['ignore', 'pipe', 'pipe']
    });
    const durationMs = performance.now() - start;

    const run: SolverRun = {
      exitCode: result.status,
      signal: result.signal,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      timedOut: false,
      durationMs
    };

    if (result.error) {
      const code = errorCode(result.error);
      if (code === 'ETIMEDOUT') {
        run.timedOut = true;
      } else if (code === 'ENOBUFS' && maxOutputBytes !== null) {
        run.outputLimitExceeded = maxOutputBytes;
      } else {
        run.launchError = result.error.message;
      }
    }

    return run;
  }
}
