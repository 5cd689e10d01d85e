/**
 * Protocol module.
 * HTTP transport for the JSON Wire Protocol and classification of
 * server-reported failures. Knows nothing about command shapes.
 */

export { Transport, formatPath } from './transport.js';
export type { TransportOptions, RequestOptions, TransportResult } from './transport.js';
export {
  classifyError,
  describeStatus,
  httpCategory,
  CommandError,
  STATUS,
  STATUS_CODES,
  STATUS_NOT_SPECIFIED,
} from './classifier.js';
export type { CommandErrorInit, StatusCodeInfo } from './classifier.js';
