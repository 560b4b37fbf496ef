/**
 * Public API of the request runner engine
 */

export * from './variable-store';
export * from './template-resolver';
export * from './callback-registry';
export * from './builtin-callbacks';
export * from './http-transport';
export * from './project';
export * from './project-loader';
export * from './request-executor';
export * from './response-logger';
export * from './exchange-archive';
export * from './socket-monitor';
export * from './socket-io-connection';
export * from './project-session';
export * from '../shared/errors';
export * from '../shared/error-codes';
export * from '../shared/types';
