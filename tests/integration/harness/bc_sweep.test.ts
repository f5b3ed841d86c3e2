/**
 * 🧪 完整流程集成測試
 *
 * 配置 → 矩陣生成 → (假) 求解器寫出結果檔 → 參考檔比對 → 報告
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { resolveHarnessConfig } from '../../../src/config/harness_config';
import { listMatrix, runValidation } from '../../../src/core/harness';
import { MemoryLogger } from '../../../src/core/logging/logger';
import type { TestCase } from '../../../src/types/index';
import { FakeSolverInvoker } from '../../utils/FakeSolver';

const GOOD_ROW = (n: number): string => `${n} 1.000000000000e-03 2.000000000000e-03\n`;

describe('BC 組合驗證 - 端到端', () => {
  let root: string;
  let runDir: string;
  let referenceDir: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'bc-sweep-'));
    runDir = path.join(root, 'run');
    referenceDir = path.join(root, 'reference');
    fs.mkdirSync(runDir);
    fs.mkdirSync(referenceDir);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function writeReference(file: string, content: string): void {
    fs.writeFileSync(path.join(referenceDir, file), content);
  }

  /** 假求解器：正常結束時將結果追加到結果檔 */
  function solverWritingResults(scripted: ConstructorParameters<typeof FakeSolverInvoker>[0] = {}): FakeSolverInvoker {
    return new FakeSolverInvoker(scripted, (testCase: TestCase) => {
      fs.appendFileSync(path.join(runDir, testCase.resultFile), GOOD_ROW(testCase.resolution[0]));
    });
  }

  test('成功、數值不符、無法判定與行程失敗混合', () => {
    writeReference('validation_3d_000000_typeGreen=0.txt', GOOD_ROW(8));
    writeReference('validation_3d_000099_typeGreen=0.txt', GOOD_ROW(8));
    writeReference('validation_3d_011033_typeGreen=0.txt', '8 5.0e-03 2.0e-03\n');
    writeReference('validation_3d_333399_typeGreen=0.txt', GOOD_ROW(8));
    // 序號 12 (000100) 沒有參考檔

    const reportFile = path.join(root, 'report.json');
    const config = resolveHarnessConfig({
      cwd: runDir,
      referenceDir,
      only: [1, 11, 12, 153, 1100],
      reportFile
    });
    const logger = new MemoryLogger();
    const invoker = solverWritingResults({ 1100: { exitCode: 137, stderr: 'Killed' } });

    const report = runValidation(config, { invoker, logger });

    expect(invoker.invoked).toEqual([1, 11, 12, 153, 1100]);
    expect(report).toMatchObject({
      total: 5,
      successes: 2,
      failures: 3,
      processFailures: 1,
      numericMismatches: 1,
      inconclusive: 1,
      exitCode: 3,
      summary: '2 test succeeded out of 5'
    });
    expect(report.records.map(r => r.outcome.kind)).toEqual([
      'success',
      'success',
      'inconclusive',
      'numeric_mismatch',
      'process_failure'
    ]);

    const info = logger.messages('info');
    expect(info).toContain('test 1 (BCs : 000000) succeeded');
    expect(info).toContain('test 11 (BCs : 000099) succeeded');
    expect(info).toContain('test 153 (BCs : 011033) failed with wrong values.');
    expect(info).toContain('test 1100 (BCs : 333399) failed with error code 137');
    expect(info.some(line => line.startsWith('test 12 (BCs : 000100) inconclusive: 無法讀取 '))).toBe(true);
    expect(info[info.length - 1]).toBe('2 test succeeded out of 5');

    // 行程失敗時不應產生結果檔
    expect(fs.existsSync(path.join(runDir, 'validation_3d_333399_typeGreen=0.txt'))).toBe(false);

    const saved: unknown = JSON.parse(fs.readFileSync(reportFile, 'utf-8'));
    expect(saved).toMatchObject({ summary: '2 test succeeded out of 5', exitCode: 3 });
    expect(saved).toHaveProperty('records.length', 5);
  });

  test('重跑時結果檔追加，仍以最新一行比對', () => {
    writeReference('validation_3d_000000_typeGreen=0.txt', GOOD_ROW(8));
    fs.writeFileSync(path.join(runDir, 'validation_3d_000000_typeGreen=0.txt'), '8 9.9e-01 9.9e-01\n');

    const config = resolveHarnessConfig({ cwd: runDir, referenceDir, only: [1] });
    const report = runValidation(config, { invoker: solverWritingResults(), logger: new MemoryLogger() });

    expect(report.exitCode).toBe(0);
    expect(report.summary).toBe('1 test succeeded out of 1');
  });

  test('listMatrix 列出配置而不執行', () => {
    const logger = new MemoryLogger();
    const config = resolveHarnessConfig({ only: [153, 11] });

    const cases = listMatrix(config, logger);

    expect(cases).toHaveLength(1100);
    expect(logger.messages('info')).toEqual([
      '11\t000099\t8x8x1\tvalidation_3d_000099_typeGreen=0.txt',
      '153\t011033\t8x8x8\tvalidation_3d_011033_typeGreen=0.txt'
    ]);
  });

  test('listMatrix 拒絕不存在的序號', () => {
    const logger = new MemoryLogger();
    const config = resolveHarnessConfig({ only: [2000] });

    expect(() => listMatrix(config, logger)).toThrow('測試序號不存在: 2000 (共 1100 個配置)');
    expect(logger.entries).toHaveLength(0);
  });
});
