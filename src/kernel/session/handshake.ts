// src/kernel/session/handshake.ts
import { toSchemaDocument } from '../schema/document.ts';
import type { ProtoSchema } from '../schema/types.ts';
import { PacketType } from './packet.ts';
import type { PacketCodec } from './packet.ts';
import type { ClientHandshake } from './types.ts';

export const HANDSHAKE_OK = 200;

export const SysKey = {
  Heartbeat: 'heartbeat',
  Dict: 'dict',
  Serializer: 'serializer',
  Protos: 'protos',
} as const;

/**
 * Schema plus the two handshake frames derived from it. Always replaced as
 * a whole so the lean frame never outlives the schema it stands in for.
 */
export interface HandshakeBundle {
  readonly schema: ProtoSchema | undefined;
  readonly full: Uint8Array;
  readonly lean: Uint8Array;
}

export function buildHandshakeBundle(
  codec: PacketCodec,
  sys: Record<string, unknown>,
  schema: ProtoSchema | undefined,
): HandshakeBundle {
  const leanSys: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(sys)) {
    if (key !== SysKey.Protos) leanSys[key] = value;
  }
  const fullSys: Record<string, unknown> = { ...leanSys };
  if (schema) fullSys[SysKey.Protos] = toSchemaDocument(schema);

  return Object.freeze({
    schema,
    full: encodeHandshake(codec, fullSys),
    lean: encodeHandshake(codec, leanSys),
  });
}

function encodeHandshake(codec: PacketCodec, sys: Record<string, unknown>): Uint8Array {
  const body = Buffer.from(JSON.stringify({ code: HANDSHAKE_OK, sys }), 'utf8');
  return codec.encode(PacketType.Handshake, body);
}

/**
 * Reads the client's handshake declaration. Anything that is not a JSON
 * object with a well-typed `sys` section yields undefined.
 */
export function parseClientHandshake(data: Uint8Array): ClientHandshake | undefined {
  if (data.length === 0) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(data).toString('utf8'));
  } catch {
    return undefined;
  }
  if (!isObject(raw)) return undefined;

  const sys = raw['sys'] === undefined ? {} : raw['sys'];
  if (!isObject(sys)) return undefined;

  const protoVersion = sys['protoVersion'] ?? 0;
  if (typeof protoVersion !== 'number' || !Number.isInteger(protoVersion)) return undefined;

  const handshake: ClientHandshake = { sys: { protoVersion } };
  const type = sys['type'];
  if (type !== undefined && type !== null) {
    if (typeof type !== 'string') return undefined;
    handshake.sys.type = type;
  }
  const version = sys['version'];
  if (version !== undefined && version !== null) {
    if (typeof version !== 'string') return undefined;
    handshake.sys.version = version;
  }
  const rsa = sys['rsa'];
  if (rsa !== undefined && rsa !== null) {
    if (!isObject(rsa)) return undefined;
    handshake.sys.rsa = rsa;
  }
  const user = raw['user'];
  if (user !== undefined && user !== null) {
    if (!isObject(user)) return undefined;
    handshake.user = user;
  }
  return handshake;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
