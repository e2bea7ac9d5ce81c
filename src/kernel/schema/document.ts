// src/kernel/schema/document.ts
import { MESSAGES_KEY } from './types.ts';
import type {
  FieldTags,
  FieldTagsDocument,
  ProtoSchema,
  RouteSchema,
  RouteSchemaDocument,
  SchemaDocument,
} from './types.ts';

export function fieldTagsToDocument(tags: FieldTags): FieldTagsDocument {
  return Object.fromEntries(tags);
}

export function routeToDocument(route: RouteSchema): RouteSchemaDocument {
  const doc: RouteSchemaDocument = fieldTagsToDocument(route.fields);
  if (route.nested.size > 0) {
    doc[MESSAGES_KEY] = messagesToDocument(route.nested);
  }
  return doc;
}

function messagesToDocument(messages: Map<string, FieldTags>): Record<string, FieldTagsDocument> {
  return Object.fromEntries([...messages].map(([name, tags]): [string, FieldTagsDocument] => [name, fieldTagsToDocument(tags)]));
}

function routesToDocument(routes: Map<string, RouteSchema>): Record<string, RouteSchemaDocument> {
  return Object.fromEntries([...routes].map(([route, schema]): [string, RouteSchemaDocument] => [route, routeToDocument(schema)]));
}

/** Body of the schema without its version; this is what the version hash covers. */
export function schemaContent(schema: ProtoSchema): Omit<SchemaDocument, 'version'> {
  const content: Omit<SchemaDocument, 'version'> = {
    server: routesToDocument(schema.server),
    client: routesToDocument(schema.client),
  };
  if (schema.messages && schema.messages.size > 0) {
    content.__messages__ = messagesToDocument(schema.messages);
  }
  return content;
}

export function toSchemaDocument(schema: ProtoSchema): SchemaDocument {
  return { version: schema.version, ...schemaContent(schema) };
}

// Reading documents back (precompiled schemas handed in by the host).

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) throw new Error(`${label} must be an object`);
  return value;
}

function requireTag(value: unknown, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new Error(`${label} must be an integer tag`);
  }
  return value;
}

function readFieldTags(raw: unknown, label: string): FieldTags {
  const obj = requireObject(raw, label);
  const tags: FieldTags = new Map();
  for (const [key, value] of Object.entries(obj)) {
    tags.set(key, requireTag(value, `${label}["${key}"]`));
  }
  return tags;
}

function readMessages(raw: unknown, label: string): Map<string, FieldTags> {
  const obj = requireObject(raw, label);
  const messages = new Map<string, FieldTags>();
  for (const [name, tags] of Object.entries(obj)) {
    messages.set(name, readFieldTags(tags, `${label}.${name}`));
  }
  return messages;
}

function readRoutes(raw: unknown, label: string): Map<string, RouteSchema> {
  const routes = new Map<string, RouteSchema>();
  if (raw === undefined) return routes;
  for (const [route, value] of Object.entries(requireObject(raw, label))) {
    const obj = requireObject(value, `${label}["${route}"]`);
    const fields: FieldTags = new Map();
    let nested = new Map<string, FieldTags>();
    for (const [key, entry] of Object.entries(obj)) {
      if (key === MESSAGES_KEY) {
        nested = readMessages(entry, `${label}["${route}"].${MESSAGES_KEY}`);
        continue;
      }
      fields.set(key, requireTag(entry, `${label}["${route}"]["${key}"]`));
    }
    routes.set(route, { fields, nested });
  }
  return routes;
}

export function fromSchemaDocument(raw: unknown): ProtoSchema {
  const doc = requireObject(raw, 'schema');
  const version = doc['version'];
  if (typeof version !== 'number' || !Number.isInteger(version) || version < 0) {
    throw new Error('schema.version must be a non-negative integer');
  }
  const schema: ProtoSchema = {
    version,
    server: readRoutes(doc['server'], 'schema.server'),
    client: readRoutes(doc['client'], 'schema.client'),
  };
  if (doc[MESSAGES_KEY] !== undefined) {
    const messages = readMessages(doc[MESSAGES_KEY], `schema.${MESSAGES_KEY}`);
    if (messages.size > 0) schema.messages = messages;
  }
  return schema;
}
