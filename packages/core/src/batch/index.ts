export { StatementBatch, type StatementBatchOptions } from './statement-batch';
export { renderCompositeScript } from './composite-script';
