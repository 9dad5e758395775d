/**
 * Error system exports for wdkeeper
 */

export {
  createErrorFromUnknown,
  type ErrorContext,
  ErrorCode,
  ErrorSeverity,
  getSystemErrorCode,
  isWdkeeperError,
  WdkeeperError
} from './codes.js';
