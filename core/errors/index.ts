/**
 * Central export point for quire error types.
 */
export { QuireError, ErrorSeverity } from './QuireError';
export type { BaseErrorDetails, QuireErrorOptions } from './QuireError';
export { SpanError } from './SpanError';
export { ModelContractError } from './ModelContractError';
export type { ModelContractViolation } from './ModelContractError';
export { LayoutAbortedError } from './LayoutAbortedError';
export { ConfigError } from './ConfigError';
