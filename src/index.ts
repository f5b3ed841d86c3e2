export * from './types/index';
export * from './core/matrix/bc_matrix';
export * from './core/solver/solver_invoker';
export * from './core/checker/result_checker';
export * from './core/runner/validation_runner';
export * from './core/logging/logger';
export * from './core/harness';
export * from './config/harness_config';
export { NumericalSafety } from './math/numerical/safety';
