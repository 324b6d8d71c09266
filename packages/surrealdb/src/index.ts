export {
  SurrealSession,
  SURREAL_DEFAULTS,
  endpointFor,
  normalizeValue,
  withSurrealDefaults,
} from './adapter/surreal-session';
export type { SurrealSessionOptions } from './adapter/surreal-session';

export type { ConnectionConfig, ResultSet, Session } from '@batchline/core';
