// src/kernel/schema/version.ts
import CRC32 from 'crc-32';
import { SILENT_LOGGER } from '../log/logger.ts';
import type { LogSink } from '../log/logger.ts';
import { schemaContent } from './document.ts';
import type { ProtoSchema } from './types.ts';

export const FALLBACK_VERSION = 1;

/** JSON with object keys sorted at every level, so equal content hashes equally. */
export function stableStringify(value: unknown): string {
  if (value === null) return 'null';
  const t = typeof value;
  if (t === 'string' || t === 'boolean') return JSON.stringify(value);
  if (t === 'number') {
    if (!Number.isFinite(value)) throw new Error(`Cannot serialize non-finite number: ${String(value)}`);
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    const parts = value.map((v: unknown) => stableStringify(v === undefined ? null : v));
    return `[${parts.join(',')}]`;
  }

  if (typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const parts: string[] = [];
    for (const [key, v] of entries) {
      if (v === undefined) continue;
      parts.push(`${JSON.stringify(key)}:${stableStringify(v)}`);
    }
    return `{${parts.join(',')}}`;
  }

  throw new Error(`Cannot serialize value of type ${t}`);
}

/** Non-negative 31-bit CRC-32 of the canonical schema content, version excluded. */
export function computeSchemaVersion(schema: ProtoSchema, logger: LogSink = SILENT_LOGGER): number {
  let canonical: string;
  try {
    canonical = stableStringify(schemaContent(schema));
  } catch (err: unknown) {
    logger.log({
      level: 'warn',
      action: 'proto.version_fallback',
      detail: { version: FALLBACK_VERSION, error: err instanceof Error ? err.message : String(err) },
    });
    return FALLBACK_VERSION;
  }

  const hash = CRC32.buf(Buffer.from(canonical, 'utf8')) >>> 0;
  const version = hash & 0x7fffffff;
  logger.log({
    level: 'info',
    action: 'proto.version_computed',
    detail: { version, hash: `0x${hash.toString(16).padStart(8, '0')}` },
  });
  return version;
}
