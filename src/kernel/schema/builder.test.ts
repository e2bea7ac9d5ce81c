// src/kernel/schema/builder.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MemoryLogger } from '../log/logger.ts';
import { buildFieldKey, buildRouteSchema, buildSchema } from './builder.ts';
import type { BuildOptions } from './builder.ts';
import { toSchemaDocument } from './document.ts';
import type { MessageRegistry, ProtoMessage } from './types.ts';

function registry(...messages: ProtoMessage[]): MessageRegistry {
  return new Map(messages.map((m): [string, ProtoMessage] => [m.name, m]));
}

function build(overrides: Partial<BuildOptions>): BuildOptions {
  return { serverRoutes: {}, clientRoutes: {}, globalMessages: false, version: 0, ...overrides };
}

const shared: ProtoMessage = {
  name: 'Shared',
  fields: [{ name: 'id', tag: 1, repeated: false, type: 'int64' }],
};
const left: ProtoMessage = {
  name: 'Left',
  fields: [{ name: 'shared', tag: 1, repeated: false, type: 'message', typeName: 'Shared' }],
};
const right: ProtoMessage = {
  name: 'Right',
  fields: [{ name: 'all', tag: 2, repeated: true, type: 'message', typeName: 'Shared' }],
};

describe('schema/builder', () => {
  it('formats field keys as modifier, type, name', () => {
    assert.equal(buildFieldKey({ name: 'level', tag: 1, repeated: false, type: 'uInt32' }), 'optional uInt32 level');
    assert.equal(
      buildFieldKey({ name: 'items', tag: 3, repeated: true, type: 'message', typeName: 'Item' }),
      'repeated message Item items',
    );
  });

  it('emits fields in tag order regardless of declaration order', () => {
    const route = buildRouteSchema(registry(), {
      name: 'M',
      fields: [
        { name: 'c', tag: 9, repeated: false, type: 'bool' },
        { name: 'a', tag: 1, repeated: false, type: 'bool' },
        { name: 'b', tag: 4, repeated: false, type: 'bool' },
      ],
    });
    assert.deepEqual([...route.fields.values()], [1, 4, 9]);
  });

  it('lets the last duplicate key win and move to its position', () => {
    const route = buildRouteSchema(registry(), {
      name: 'M',
      fields: [
        { name: 'x', tag: 1, repeated: false, type: 'string' },
        { name: 'y', tag: 2, repeated: false, type: 'string' },
        { name: 'x', tag: 3, repeated: false, type: 'string' },
      ],
    });
    assert.deepEqual([...route.fields], [
      ['optional string y', 2],
      ['optional string x', 3],
    ]);
  });

  it('omits routes whose message is unknown', () => {
    const logger = new MemoryLogger();
    const schema = buildSchema(registry(shared), build({
      serverRoutes: { 'a.b.ok': 'Shared', 'a.b.gone': 'Missing' },
      clientRoutes: { 'a.b.gone': 'Missing' },
    }), logger);

    assert.deepEqual([...schema.server.keys()], ['a.b.ok']);
    assert.equal(schema.client.size, 0);
    assert.equal(logger.actions().filter(a => a === 'proto.route_missing').length, 2);
  });

  it('terminates on self-referencing and mutually recursive messages', () => {
    const node: ProtoMessage = {
      name: 'Node',
      fields: [
        { name: 'children', tag: 1, repeated: true, type: 'message', typeName: 'Node' },
        { name: 'owner', tag: 2, repeated: false, type: 'message', typeName: 'Tree' },
      ],
    };
    const tree: ProtoMessage = {
      name: 'Tree',
      fields: [{ name: 'root', tag: 1, repeated: false, type: 'message', typeName: 'Node' }],
    };
    const route = buildRouteSchema(registry(node, tree), tree);
    assert.deepEqual([...route.nested.keys()].sort(), ['Node', 'Tree']);
  });

  it('collects every message of a long acyclic chain', () => {
    const chain: ProtoMessage[] = [];
    for (let i = 0; i < 70; i++) {
      chain.push({
        name: `M${i}`,
        fields: i < 69 ? [{ name: 'next', tag: 1, repeated: false, type: 'message', typeName: `M${i + 1}` }] : [],
      });
    }
    const schema = buildSchema(registry(...chain), build({ serverRoutes: { r: 'M0' } }));
    const nested = schema.server.get('r')?.nested;
    assert.equal(nested?.size, 69);
    assert.equal(nested?.has('M69'), true);
    assert.deepEqual([...(nested?.get('M68') ?? [])], [['optional message M69 next', 1]]);
  });

  it('keeps nested messages per route by default', () => {
    const schema = buildSchema(registry(shared, left, right), build({
      serverRoutes: { 'r.left': 'Left', 'r.right': 'Right' },
    }));
    const doc = toSchemaDocument(schema);
    assert.deepEqual(doc.server['r.left'], {
      'optional message Shared shared': 1,
      __messages__: { Shared: { 'optional int64 id': 1 } },
    });
    assert.equal(doc.__messages__, undefined);
  });

  it('hoists nested messages once under global mode', () => {
    const schema = buildSchema(registry(shared, left, right), build({
      serverRoutes: { 'r.left': 'Left' },
      clientRoutes: { 'r.right': 'Right' },
      globalMessages: true,
    }));
    const doc = toSchemaDocument(schema);
    assert.deepEqual(doc.__messages__, { Shared: { 'optional int64 id': 1 } });
    assert.deepEqual(doc.server['r.left'], { 'optional message Shared shared': 1 });
    assert.deepEqual(doc.client['r.right'], { 'repeated message Shared all': 2 });
  });

  it('leaves out the global dictionary when nothing is nested', () => {
    const schema = buildSchema(registry(shared), build({ serverRoutes: { s: 'Shared' }, globalMessages: true }));
    assert.equal(schema.messages, undefined);
  });

  it('derives the version from content unless one is configured', () => {
    const opts = build({ serverRoutes: { s: 'Shared' } });
    const derived = buildSchema(registry(shared), opts);
    assert.equal(buildSchema(registry(shared), opts).version, derived.version);
    assert.equal(buildSchema(registry(shared), { ...opts, version: 42 }).version, 42);
  });
});
