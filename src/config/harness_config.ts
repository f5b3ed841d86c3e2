/**
 * 🎛️ 驗證框架配置
 *
 * 預設值 + 部分覆寫，再統一驗證；命令列參數由 parseCliArgs 轉為部分配置。
 */

import { DEFAULT_GRID_SIZE } from '../core/matrix/bc_matrix';
import { isSolverVariant, SOLVER_EXECUTABLES, type SolverVariant } from '../core/solver/solver_invoker';

export interface HarnessConfig {
  solver: SolverVariant;
  /** 覆寫求解器路徑；null 時依 solver 選擇 */
  executable: string | null;
  /** 求解器工作目錄，結果檔也寫在這裡 */
  cwd: string;
  gridSize: number;
  /** 單次求解逾時 (ms)；null 表示不設限 */
  timeoutMs: number | null;
  /** stdout/stderr 擷取上限 (bytes)；null 表示不設限 */
  maxOutputBytes: number | null;
  referenceDir: string;
  relativeTolerance: number;
  absoluteTolerance: number;
  only: number[];
  listOnly: boolean;
  reportFile: string | null;
  verbose: boolean;
}

export const DEFAULT_HARNESS_CONFIG: Readonly<HarnessConfig> = {
  solver: 'nb',
  executable: null,
  cwd: '.',
  gridSize: DEFAULT_GRID_SIZE,
  timeoutMs: null,
  maxOutputBytes: null,
  referenceDir: 'reference',
  relativeTolerance: 1e-6,
  absoluteTolerance: 1e-12,
  only: [],
  listOnly: false,
  reportFile: null,
  verbose: false
};

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} 必須為正整數: ${value}`);
  }
}

function assertNonNegative(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} 必須為非負數: ${value}`);
  }
}

export function resolveHarnessConfig(overrides: Partial<HarnessConfig> = {}): HarnessConfig {
  const config: HarnessConfig = {
    ...DEFAULT_HARNESS_CONFIG,
    ...overrides,
    only: [...(overrides.only ?? DEFAULT_HARNESS_CONFIG.only)]
  };

  if (!isSolverVariant(config.solver)) {
    throw new Error(`未知的求解器版本: ${config.solver}`);
  }
  assertPositiveInteger(config.gridSize, 'gridSize');
  if (config.timeoutMs !== null) {
    assertPositiveInteger(config.timeoutMs, 'timeoutMs');
  }
  if (config.maxOutputBytes !== null) {
    assertPositiveInteger(config.maxOutputBytes, 'maxOutputBytes');
  }
  assertNonNegative(config.relativeTolerance, 'relativeTolerance');
  assertNonNegative(config.absoluteTolerance, 'absoluteTolerance');
  config.only.forEach(i => assertPositiveInteger(i, 'only'));

  return config;
}

export function executableFor(config: HarnessConfig): string {
  return config.executable ?? SOLVER_EXECUTABLES[config.solver];
}

// === 命令列 ===

export const USAGE = [
  'Usage: validate-3d-bcs [options]',
  '',
  '  --solver <nb|a2a>     solver build to run (default: nb)',
  '  --exe <path>          explicit solver executable',
  '  --cwd <dir>           working directory of the solver (default: .)',
  '  --res <n>             grid points per axis (default: 8)',
  '  --timeout <ms>        per-run timeout (default: none)',
  '  --max-output <bytes>  stop a run whose stdout or stderr exceeds this size (default: none)',
  '  --reference <dir>     directory of reference result files (default: reference)',
  '  --rtol <x>            relative tolerance (default: 1e-6)',
  '  --atol <x>            absolute tolerance (default: 1e-12)',
  '  --only <i[,j...]>     run only these 1-based test indices',
  '  --list                print the test matrix without running it',
  '  --report <file>       write a JSON report',
  '  --verbose             debug output',
  '  --help                show this message'
].join('\n');

export interface CliArgs {
  help: boolean;
  overrides: Partial<HarnessConfig>;
}

function parseNumber(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`${flag} 需要數值參數，收到: ${value}`);
  }
  return parsed;
}

function parseIndexList(flag: string, value: string): number[] {
  return value.split(',').map(part => parseNumber(flag, part));
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const overrides: Partial<HarnessConfig> = {};
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const flag = argv[i];
    if (flag === undefined) continue;

    const takeValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`${flag} 需要參數`);
      }
      i += 1;
      return value;
    };

    switch (flag) {
      case '--solver': {
        const value = takeValue();
        if (!isSolverVariant(value)) {
          throw new Error(`未知的求解器版本: ${value} (可用: ${Object.keys(SOLVER_EXECUTABLES).join(', ')})`);
        }
        overrides.solver = value;
        break;
      }
      case '--exe':
        overrides.executable = takeValue();
        break;
      case '--cwd':
        overrides.cwd = takeValue();
        break;
      case '--res':
        overrides.gridSize = parseNumber(flag, takeValue());
        break;
      case '--timeout':
        overrides.timeoutMs = parseNumber(flag, takeValue());
        break;
      case '--max-output':
        overrides.maxOutputBytes = parseNumber(flag, takeValue());
        break;
      case '--reference':
        overrides.referenceDir = takeValue();
        break;
      case '--rtol':
        overrides.relativeTolerance = parseNumber(flag, takeValue());
        break;
      case '--atol':
        overrides.absoluteTolerance = parseNumber(flag, takeValue());
        break;
      case '--only':
        overrides.only = [...(overrides.only ?? []), ...parseIndexList(flag, takeValue())];
        break;
      case '--list':
        overrides.listOnly = true;
        break;
      case '--report':
        overrides.reportFile = takeValue();
        break;
      case '--verbose':
        overrides.verbose = true;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        throw new Error(`未知參數: ${flag}`);
    }
  }

  return { help, overrides };
}
