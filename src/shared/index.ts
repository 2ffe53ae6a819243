export * from './logging/json-log';
export * from './tracing/ids';
