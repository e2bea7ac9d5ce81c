export * from './kernel/schema/index.ts';
export * from './kernel/session/index.ts';
export * from './kernel/config/index.ts';
export * from './kernel/log/index.ts';
