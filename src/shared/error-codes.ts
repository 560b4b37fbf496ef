/**
 * Error codes surfaced to the operator and written into records.
 * Request-local kinds never abort a session; CONFIG_INVALID is fatal at load time.
 */

export const ERROR_UnboundVariable = 'UNBOUND_VARIABLE';
export const ERROR_TransportFailure = 'TRANSPORT_FAILURE';
export const ERROR_CallbackFailure = 'CALLBACK_FAILURE';
export const ERROR_ConfigInvalid = 'CONFIG_INVALID';
export const ERROR_SocketDisconnected = 'SOCKET_DISCONNECTED';
export const ERROR_RequestCancelled = 'REQUEST_CANCELLED';
export const ERROR_LogWriteFailed = 'LOG_WRITE_FAILED';

export type ErrorCode =
  | typeof ERROR_UnboundVariable
  | typeof ERROR_TransportFailure
  | typeof ERROR_CallbackFailure
  | typeof ERROR_ConfigInvalid
  | typeof ERROR_SocketDisconnected
  | typeof ERROR_RequestCancelled
  | typeof ERROR_LogWriteFailed;

/**
 * Get human-readable error message for error code
 */
export function getErrorMessage(errorCode: ErrorCode): string {
  switch (errorCode) {
    case ERROR_UnboundVariable:
      return 'Template references a variable that is not defined';
    case ERROR_TransportFailure:
      return 'Request could not be delivered';
    case ERROR_CallbackFailure:
      return 'Response callback failed, variables left unchanged';
    case ERROR_ConfigInvalid:
      return 'Project definition is invalid';
    case ERROR_SocketDisconnected:
      return 'Socket.IO connection lost';
    case ERROR_RequestCancelled:
      return 'Request cancelled by the operator';
    case ERROR_LogWriteFailed:
      return 'Record could not be written';
  }
}
