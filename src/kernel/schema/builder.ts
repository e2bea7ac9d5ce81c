// src/kernel/schema/builder.ts
import { SILENT_LOGGER } from '../log/logger.ts';
import type { LogSink } from '../log/logger.ts';
import type { ProtoOptions } from './options.ts';
import { computeSchemaVersion } from './version.ts';
import type {
  FieldModifier,
  FieldTags,
  MessageField,
  MessageRegistry,
  ProtoField,
  ProtoMessage,
  ProtoSchema,
  RouteMapping,
  RouteSchema,
} from './types.ts';

export type BuildOptions = Pick<ProtoOptions, 'serverRoutes' | 'clientRoutes' | 'globalMessages' | 'version'>;

export function buildSchema(
  registry: MessageRegistry,
  options: BuildOptions,
  logger: LogSink = SILENT_LOGGER,
): ProtoSchema {
  const schema: ProtoSchema = {
    version: 0,
    server: buildRoutes(registry, options.serverRoutes, 'server', logger),
    client: buildRoutes(registry, options.clientRoutes, 'client', logger),
  };

  if (options.globalMessages) {
    const global = new Map<string, FieldTags>();
    collectGlobalMessages(schema.server, global, logger);
    collectGlobalMessages(schema.client, global, logger);
    if (global.size > 0) schema.messages = global;
  }

  schema.version = options.version > 0 ? options.version : computeSchemaVersion(schema, logger);

  logger.log({
    level: 'info',
    action: 'proto.schema_built',
    detail: {
      version: schema.version,
      server_routes: schema.server.size,
      client_routes: schema.client.size,
      global_messages: schema.messages?.size ?? 0,
    },
  });
  return schema;
}

function buildRoutes(
  registry: MessageRegistry,
  mapping: RouteMapping,
  side: 'server' | 'client',
  logger: LogSink,
): Map<string, RouteSchema> {
  const routes = new Map<string, RouteSchema>();
  for (const [route, messageName] of Object.entries(mapping)) {
    const message = registry.get(messageName);
    if (!message) {
      logger.log({
        level: 'warn',
        action: 'proto.route_missing',
        detail: { side, route, message: messageName },
      });
      continue;
    }
    routes.set(route, buildRouteSchema(registry, message));
  }
  return routes;
}

export function buildRouteSchema(registry: MessageRegistry, message: ProtoMessage): RouteSchema {
  const nested = new Map<string, FieldTags>();
  const visiting = new Set<string>();
  const fields = buildFieldTags(message, (field) => {
    collectNestedMessages(registry, field.typeName, nested, visiting);
  });
  return { fields, nested };
}

function buildFieldTags(
  message: ProtoMessage,
  onMessageField: (field: MessageField) => void,
): FieldTags {
  const tags: FieldTags = new Map();
  // Array.prototype.sort is stable: equal tags keep source order.
  const sorted = [...message.fields].sort((a, b) => a.tag - b.tag);
  for (const field of sorted) {
    const key = buildFieldKey(field);
    // Duplicate keys: last write wins and takes the later position.
    tags.delete(key);
    tags.set(key, field.tag);
    if (field.type === 'message') onMessageField(field);
  }
  return tags;
}

function collectNestedMessages(
  registry: MessageRegistry,
  name: string,
  collected: Map<string, FieldTags>,
  visiting: Set<string>,
): void {
  if (collected.has(name) || visiting.has(name)) return;
  const message = registry.get(name);
  if (!message) return;

  visiting.add(name);
  const tags = buildFieldTags(message, (field) => {
    collectNestedMessages(registry, field.typeName, collected, visiting);
  });
  visiting.delete(name);
  collected.set(name, tags);
}

function collectGlobalMessages(
  routes: Map<string, RouteSchema>,
  global: Map<string, FieldTags>,
  logger: LogSink,
): void {
  for (const [route, schema] of routes) {
    for (const [name, tags] of schema.nested) {
      const existing = global.get(name);
      if (!existing) {
        global.set(name, tags);
        continue;
      }
      if (!sameFieldTags(existing, tags)) {
        logger.log({
          level: 'warn',
          action: 'proto.message_conflict',
          detail: { message: name, route },
        });
      }
    }
    schema.nested = new Map();
  }
}

function sameFieldTags(a: FieldTags, b: FieldTags): boolean {
  if (a.size !== b.size) return false;
  for (const [key, tag] of a) {
    if (b.get(key) !== tag) return false;
  }
  return true;
}

export function buildFieldKey(field: ProtoField): string {
  const modifier: FieldModifier = field.repeated ? 'repeated' : 'optional';
  const type = field.type === 'message' ? `message ${field.typeName}` : field.type;
  return buildFieldKeyFrom(modifier, type, field.name);
}

export function buildFieldKeyFrom(modifier: FieldModifier, type: string, name: string): string {
  return `${modifier} ${type} ${name}`;
}
