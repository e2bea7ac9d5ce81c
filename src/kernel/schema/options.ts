// src/kernel/schema/options.ts
import type { RouteMapping } from './types.ts';

export interface ProtoOptions {
  /** Explicit `.proto` paths, parsed before the directory scan. */
  files: string[];
  /** Directory scanned recursively for `.proto` files; empty disables the scan. */
  dir: string;
  /** 0 derives the version from schema content. */
  version: number;
  /** Merge nested message definitions into one top-level dictionary. */
  globalMessages: boolean;
  /** route -> message decoded by the client. */
  serverRoutes: RouteMapping;
  /** route -> message encoded by the client. */
  clientRoutes: RouteMapping;
}

export function defaultProtoOptions(): ProtoOptions {
  return {
    files: [],
    dir: '',
    version: 0,
    globalMessages: false,
    serverRoutes: {},
    clientRoutes: {},
  };
}

export function hasProtoConfig(options: Pick<ProtoOptions, 'files' | 'dir'>): boolean {
  return options.dir !== '' || options.files.length > 0;
}
