/**
 * Types Index - Barrel Export
 */

export {
  HTTP_METHODS,
  SOCKET_IO_METHOD,
} from './project-types';

export type {
  HttpMethod,
  TemplateValue,
  TemplateRecord,
  HttpRequestDefinition,
  SocketRequestDefinition,
  RequestDefinition,
  EmitOnConnect,
  ProjectDefinition,
  ResolvedRequest,
} from './project-types';

export type {
  HttpResponseData,
  ExecutionStatus,
  CallbackReport,
  ExecutionResult,
  SocketEvent,
  MonitorNoticeType,
  MonitorNotice,
  LogRecord,
} from './record-types';
