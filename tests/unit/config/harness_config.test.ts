/**
 * 🧪 配置與命令列解析
 */

import { describe, test, expect } from 'vitest';
import {
  DEFAULT_HARNESS_CONFIG,
  executableFor,
  parseCliArgs,
  resolveHarnessConfig
} from '../../../src/config/harness_config';

describe('resolveHarnessConfig - 預設值與驗證', () => {
  test('無覆寫時使用預設值', () => {
    const config = resolveHarnessConfig();

    expect(config).toEqual(DEFAULT_HARNESS_CONFIG);
    expect(config.timeoutMs).toBeNull();
    expect(config.maxOutputBytes).toBeNull();
    expect(config.gridSize).toBe(8);
  });

  test('部分覆寫', () => {
    const config = resolveHarnessConfig({ gridSize: 16, timeoutMs: 60000, only: [3] });

    expect(config.gridSize).toBe(16);
    expect(config.timeoutMs).toBe(60000);
    expect(config.only).toEqual([3]);
    expect(config.solver).toBe('nb');
  });

  test('不共用預設的 only 陣列', () => {
    const config = resolveHarnessConfig();
    config.only.push(1);

    expect(DEFAULT_HARNESS_CONFIG.only).toEqual([]);
  });

  test('非法數值應拋出異常', () => {
    expect(() => resolveHarnessConfig({ gridSize: 0 })).toThrow('gridSize 必須為正整數: 0');
    expect(() => resolveHarnessConfig({ timeoutMs: 1.5 })).toThrow('timeoutMs 必須為正整數: 1.5');
    expect(() => resolveHarnessConfig({ relativeTolerance: -1 })).toThrow('relativeTolerance 必須為非負數: -1');
    expect(() => resolveHarnessConfig({ only: [0] })).toThrow('only 必須為正整數: 0');
    expect(() => resolveHarnessConfig({ maxOutputBytes: 0 })).toThrow('maxOutputBytes 必須為正整數: 0');
  });

  test('求解器路徑', () => {
    expect(executableFor(resolveHarnessConfig())).toBe('./flups_validation_nb');
    expect(executableFor(resolveHarnessConfig({ solver: 'a2a' }))).toBe('./flups_validation_a2a');
    expect(executableFor(resolveHarnessConfig({ solver: 'a2a', executable: '/opt/solver' }))).toBe('/opt/solver');
  });
});

describe('parseCliArgs - 命令列', () => {
  test('無參數', () => {
    expect(parseCliArgs([])).toEqual({ help: false, overrides: {} });
  });

  test('解析所有選項', () => {
    const { help, overrides } = parseCliArgs([
      '--solver', 'a2a',
      '--exe', './build/solver',
      '--cwd', 'run',
      '--res', '16',
      '--timeout', '1000',
      '--max-output', '1048576',
      '--reference', 'ref',
      '--rtol', '1e-4',
      '--atol', '0',
      '--only', '3,5',
      '--only', '7',
      '--list',
      '--report', 'report.json',
      '--verbose'
    ]);

    expect(help).toBe(false);
    expect(overrides).toEqual({
      solver: 'a2a',
      executable: './build/solver',
      cwd: 'run',
      gridSize: 16,
      timeoutMs: 1000,
      maxOutputBytes: 1048576,
      referenceDir: 'ref',
      relativeTolerance: 1e-4,
      absoluteTolerance: 0,
      only: [3, 5, 7],
      listOnly: true,
      reportFile: 'report.json',
      verbose: true
    });
  });

  test('--help', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  test('錯誤的參數應拋出異常', () => {
    expect(() => parseCliArgs(['--solver', 'gpu'])).toThrow('未知的求解器版本: gpu (可用: nb, a2a)');
    expect(() => parseCliArgs(['--rtol'])).toThrow('--rtol 需要參數');
    expect(() => parseCliArgs(['--cwd', '--list'])).toThrow('--cwd 需要參數');
    expect(() => parseCliArgs(['--res', 'abc'])).toThrow('--res 需要數值參數，收到: abc');
    expect(() => parseCliArgs(['--only', '1,,2'])).toThrow('--only 需要數值參數，收到: ');
    expect(() => parseCliArgs(['--bogus'])).toThrow('未知參數: --bogus');
  });

  test('解析結果可直接交給 resolveHarnessConfig 驗證', () => {
    const { overrides } = parseCliArgs(['--res', '0']);

    expect(() => resolveHarnessConfig(overrides)).toThrow('gridSize 必須為正整數: 0');
  });
});
