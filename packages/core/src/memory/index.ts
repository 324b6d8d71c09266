export * from './memory-session';
export { EngineError } from './evaluator';
export type { Row } from './evaluator';
