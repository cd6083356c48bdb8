export { CapacityModel, roundHalfUp } from './capacity-model.js';
export { plan } from './planner.js';
export { execute, validateTransfer } from './executor.js';
export type { ExecuteOptions, TransferCheck } from './executor.js';
export { simulateIntake, splitIntake } from './intake-simulator.js';
export type { IntakeSplit } from './intake-simulator.js';
export { formatPlan, formatExecutionReport, formatTransfer, formatSummary } from './report.js';
export type { RenderOptions } from './report.js';
export type * from './types.js';
