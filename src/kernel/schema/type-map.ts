// src/kernel/schema/type-map.ts
import type { ScalarFieldType } from './types.ts';

const SCALAR_TYPES: ReadonlyMap<string, ScalarFieldType> = new Map<string, ScalarFieldType>([
  ['string', 'string'],
  ['bool', 'bool'],
  ['int32', 'int32'],
  ['uint32', 'uInt32'],
  ['sint32', 'sInt32'],
  ['int64', 'int64'],
  ['uint64', 'uInt64'],
  ['sint64', 'sInt64'],
  ['float', 'float'],
  ['double', 'double'],
  ['bytes', 'bytes'],
  ['fixed32', 'uInt32'],
  ['fixed64', 'uInt64'],
  ['sfixed32', 'int32'],
  ['sfixed64', 'int64'],
]);

export type Canonicalized =
  | { found: true; type: ScalarFieldType }
  | { found: false };

export function canonicalize(rawToken: string): Canonicalized {
  const type = SCALAR_TYPES.get(rawToken);
  return type ? { found: true, type } : { found: false };
}

/** `pkg.sub.Name` -> `Name`. */
export function normalizeTypeName(raw: string): string {
  const dot = raw.lastIndexOf('.');
  return dot === -1 ? raw : raw.slice(dot + 1);
}
