// src/kernel/config/yaml-loader.ts
import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { isLogLevel } from '../log/logger.ts';
import type { LogLevel } from '../log/logger.ts';
import { defaultProtoOptions } from '../schema/options.ts';
import type { ProtoOptions } from '../schema/options.ts';
import type { RouteMapping } from '../schema/types.ts';
import { DEFAULT_HEARTBEAT_SECONDS } from '../session/command.ts';

export interface ServerConfig {
  heartbeat: number;
  serializer: string;
  logLevel: LogLevel;
  /** Absent when the file has no `proto` section. */
  proto?: ProtoOptions;
}

export const DEFAULT_SERIALIZER = 'protobuf';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) throw new Error(`${label} must be a mapping`);
  return value;
}

function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new Error(`${label} must be a string`);
  return value;
}

function optionalInteger(value: unknown, label: string, min: number): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new Error(`${label} must be an integer >= ${min}`);
  }
  return value;
}

function readRoutes(value: unknown, label: string): RouteMapping {
  if (value === undefined || value === null) return {};
  const raw = requireObject(value, label);
  const routes: RouteMapping = {};
  for (const [route, message] of Object.entries(raw)) {
    if (typeof message !== 'string' || message === '') {
      throw new Error(`${label}["${route}"] must name a message`);
    }
    routes[route] = message;
  }
  return routes;
}

function readProto(value: unknown, baseDir: string): ProtoOptions {
  const raw = requireObject(value, 'proto');
  const options = defaultProtoOptions();

  const files = raw['files'];
  if (files !== undefined && files !== null) {
    if (!Array.isArray(files) || !files.every((f): f is string => typeof f === 'string')) {
      throw new Error('proto.files must be a list of paths');
    }
    options.files = files.map(f => path.resolve(baseDir, f));
  }

  const dir = optionalString(raw['dir'], 'proto.dir');
  if (dir) options.dir = path.resolve(baseDir, dir);

  options.version = optionalInteger(raw['version'], 'proto.version', 0) ?? 0;

  const globalMessages = raw['global_messages'];
  if (globalMessages !== undefined && globalMessages !== null) {
    if (typeof globalMessages !== 'boolean') throw new Error('proto.global_messages must be a boolean');
    options.globalMessages = globalMessages;
  }

  options.serverRoutes = readRoutes(raw['server_routes'], 'proto.server_routes');
  options.clientRoutes = readRoutes(raw['client_routes'], 'proto.client_routes');
  return options;
}

export function parseServerConfig(content: string, baseDir: string): ServerConfig {
  const parsed: unknown = parse(content);
  const raw = parsed === null || parsed === undefined ? {} : requireObject(parsed, 'config');

  const logLevel = raw['log_level'] ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`log_level must be one of debug|info|warn|error, got "${String(logLevel)}"`);
  }

  const config: ServerConfig = {
    heartbeat: optionalInteger(raw['heartbeat'], 'heartbeat', 1) ?? DEFAULT_HEARTBEAT_SECONDS,
    serializer: optionalString(raw['serializer'], 'serializer') ?? DEFAULT_SERIALIZER,
    logLevel,
  };
  if (raw['proto'] !== undefined && raw['proto'] !== null) {
    config.proto = readProto(raw['proto'], baseDir);
  }
  return config;
}

/** Relative paths inside the file resolve against the file's directory. */
export function loadServerConfig(filePath: string): ServerConfig {
  const content = fs.readFileSync(filePath, 'utf8');
  return parseServerConfig(content, path.dirname(path.resolve(filePath)));
}
