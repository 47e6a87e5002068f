export type { Stage } from './domain/Stage.js';
export { composeStages } from './domain/Stage.js';
export { RunContext } from './application/RunContext.js';
export { ValidateBatch } from './application/stages/ValidateBatch.js';
export { TransformBatch } from './application/stages/TransformBatch.js';
export { LoadBatch } from './application/stages/LoadBatch.js';
export type { LoadBatchOptions } from './application/stages/LoadBatch.js';
export { EtlPipeline } from './application/EtlPipeline.js';
export type { EtlPipelineOptions, RunOptions } from './application/EtlPipeline.js';
export { ParallelRunner } from './application/ParallelRunner.js';
export type { JobRunner, PipelineJob, RunAllOptions } from './application/ParallelRunner.js';
export { builtinCatalog, dailyStockAnalytics, financialRatios, portfolioPositions } from './catalog/destinations.js';
