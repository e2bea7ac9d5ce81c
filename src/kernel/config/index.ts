export { loadServerConfig, parseServerConfig, DEFAULT_SERIALIZER } from './yaml-loader.ts';
export type { ServerConfig } from './yaml-loader.ts';
