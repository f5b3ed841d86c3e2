#!/usr/bin/env node
/**
 * 🧪 3-D 邊界條件組合驗證
 *
 * 對 X/Y/Z 三軸所有 BC 組合執行求解器並比對數值結果。
 * 行程結束碼 = 失敗配置數 (上限 255)，0 表示全部通過。
 *
 * 用法：
 *   validate-3d-bcs                       - 執行完整矩陣
 *   validate-3d-bcs --only 17,42          - 只重跑指定序號
 *   validate-3d-bcs --list                - 列出矩陣
 *   validate-3d-bcs --timeout 600000      - 單次求解逾時
 */

import { parseCliArgs, resolveHarnessConfig, USAGE } from './src/config/harness_config';
import { listMatrix, runValidation } from './src/core/harness';

function main(argv: readonly string[]): number {
  const { help, overrides } = parseCliArgs(argv);
  if (help) {
    console.log(USAGE);
    return 0;
  }

  const config = resolveHarnessConfig(overrides);

  if (config.listOnly) {
    listMatrix(config);
    return 0;
  }

  return runValidation(config).exitCode;
}

try {
  process.exitCode = main(process.argv.slice(2));
} catch (error) {
  // 配置錯誤或檢查器本身崩潰：不屬於任何配置的失敗
  console.error('🚨 驗證運行異常：', error instanceof Error ? error.message : error);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
