/**
 * 🏗️ 組裝：配置 → 矩陣 → 執行器
 */

import path from 'path';
import type { AggregateReport, Logger, TestCase } from '../types/index';
import { executableFor, type HarnessConfig } from '../config/harness_config';
import { generateTestCases } from './matrix/bc_matrix';
import { ProcessSolverInvoker, type SolverInvoker } from './solver/solver_invoker';
import { ReferenceResultChecker, type ResultChecker } from './checker/result_checker';
import { ValidationRunner, selectTestCases } from './runner/validation_runner';
import { ConsoleLogger } from './logging/logger';

export interface HarnessDependencies {
  invoker?: SolverInvoker;
  checker?: ResultChecker;
  logger?: Logger;
}

export function createInvoker(config: HarnessConfig, logger: Logger): SolverInvoker {
  return new ProcessSolverInvoker({
    executable: executableFor(config),
    cwd: path.resolve(config.cwd),
    timeoutMs: config.timeoutMs,
    maxOutputBytes: config.maxOutputBytes,
    logger
  });
}

export function createChecker(config: HarnessConfig, logger: Logger): ResultChecker {
  return new ReferenceResultChecker({
    resultDir: path.resolve(config.cwd),
    referenceDir: path.resolve(config.referenceDir),
    relativeTolerance: config.relativeTolerance,
    absoluteTolerance: config.absoluteTolerance,
    logger
  });
}

export function formatTestCase(testCase: TestCase): string {
  const [nx, ny, nz] = testCase.resolution;
  return `${testCase.index}\t${testCase.code}\t${nx}x${ny}x${nz}\t${testCase.resultFile}`;
}

/**
 * 列出矩陣內容，不執行求解器
 */
export function listMatrix(config: HarnessConfig, logger: Logger = new ConsoleLogger(config.verbose)): TestCase[] {
  const testCases = generateTestCases({ gridSize: config.gridSize });
  for (const testCase of selectTestCases(testCases, config.only)) {
    logger.info(formatTestCase(testCase));
  }
  return testCases;
}

/**
 * 執行完整驗證並返回報告
 */
export function runValidation(config: HarnessConfig, deps: HarnessDependencies = {}): AggregateReport {
  const logger = deps.logger ?? new ConsoleLogger(config.verbose);
  const testCases = generateTestCases({ gridSize: config.gridSize });

  logger.debug(`共 ${testCases.length} 個 BC 配置，求解器: ${executableFor(config)}`);

  const runner = new ValidationRunner(
    deps.invoker ?? createInvoker(config, logger),
    deps.checker ?? createChecker(config, logger),
    { only: config.only, reportFile: config.reportFile, logger }
  );

  return runner.run(testCases);
}
