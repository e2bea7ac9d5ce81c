// src/kernel/schema/grammar.ts

export type LineMatch =
  | { kind: 'blank' }
  | { kind: 'comment' }
  | { kind: 'message-header'; name: string }
  | { kind: 'map-field'; keyType: string; valueType: string; name: string; tag: number }
  | { kind: 'field'; repeated: boolean; type: string; name: string; tag: number }
  | { kind: 'other' };

const COMMENT_MARKER = '//';

const MESSAGE_HEADER = /^\s*message\s+(?<name>\w+)\s*\{?\s*$/;
const MAP_FIELD =
  /^\s*map\s*<\s*(?<keyType>[\w.]+)\s*,\s*(?<valueType>[\w.]+)\s*>\s+(?<name>\w+)\s*=\s*(?<tag>\d+)\s*;/;
// Accepts a proto2-style `optional` label; such fields compile like unlabelled ones.
const FIELD =
  /^\s*(?:(?<modifier>repeated|optional)\s+)?(?<type>[\w.]+)\s+(?<name>\w+)\s*=\s*(?<tag>\d+)\s*;/;

/**
 * Classifies one source line. Precedence is fixed: blank, comment,
 * message header, map field, plain field. The map pattern must run before
 * the plain one because `map<K,V>` lines are otherwise read as junk.
 */
export function classifyLine(line: string): LineMatch {
  const trimmed = line.trim();
  if (trimmed === '') return { kind: 'blank' };
  if (trimmed.startsWith(COMMENT_MARKER)) return { kind: 'comment' };

  const header = MESSAGE_HEADER.exec(line)?.groups;
  if (header?.['name']) {
    return { kind: 'message-header', name: header['name'] };
  }

  const map = MAP_FIELD.exec(line)?.groups;
  if (map?.['keyType'] && map['valueType'] && map['name'] && map['tag']) {
    return {
      kind: 'map-field',
      keyType: map['keyType'],
      valueType: map['valueType'],
      name: map['name'],
      tag: parseTag(map['tag']),
    };
  }

  const field = FIELD.exec(line)?.groups;
  if (field?.['type'] && field['name'] && field['tag']) {
    return {
      kind: 'field',
      repeated: field['modifier'] === 'repeated',
      type: field['type'],
      name: field['name'],
      tag: parseTag(field['tag']),
    };
  }

  return { kind: 'other' };
}

// Tags too large to represent exactly fall back to 0 instead of rejecting
// the field. Kept for compatibility with already-compiled schemas.
export function parseTag(raw: string): number {
  const tag = Number.parseInt(raw, 10);
  return Number.isSafeInteger(tag) ? tag : 0;
}

export function braceDelta(line: string): number {
  let delta = 0;
  for (const ch of line) {
    if (ch === '{') delta += 1;
    else if (ch === '}') delta -= 1;
  }
  return delta;
}
