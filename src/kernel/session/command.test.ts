// src/kernel/session/command.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as path from 'node:path';
import * as url from 'node:url';
import { MemoryLogger } from '../log/logger.ts';
import { defaultProtoOptions } from '../schema/options.ts';
import type { ProtoSchema } from '../schema/types.ts';
import { Agent } from './agent.ts';
import { SessionCommand } from './command.ts';
import type { SessionCommandOptions } from './command.ts';
import { HEADER_LENGTH, PacketType, FramePacketCodec } from './packet.ts';
import type { Packet } from './packet.ts';
import type { Message, MessageCodec, Route, SessionAgent } from './types.ts';

const packets = new FramePacketCodec();

const schema: ProtoSchema = {
  version: 42,
  server: new Map([['area.playerHandler.info', { fields: new Map([['optional string name', 1]]), nested: new Map() }]]),
  client: new Map(),
};

// Envelope: {"id":1,"route":"a.b.c"}; routes must have three segments.
const jsonCodec: MessageCodec = {
  decode(bytes: Uint8Array): Message {
    const raw: unknown = JSON.parse(Buffer.from(bytes).toString('utf8'));
    if (typeof raw !== 'object' || raw === null || !('id' in raw) || !('route' in raw)) {
      throw new Error('bad envelope');
    }
    const { id, route } = raw;
    if (typeof id !== 'number' || typeof route !== 'string') throw new Error('bad envelope');
    return { id, route, body: new Uint8Array(0) };
  },
  decodeRoute(route: string): Route {
    const [nodeType, handlerName, method, ...rest] = route.split('.');
    if (!nodeType || !handlerName || !method || rest.length > 0) throw new Error(`bad route: ${route}`);
    return { nodeType, handlerName, method };
  },
};

interface Harness {
  command: SessionCommand;
  agent: Agent;
  sent: Uint8Array[];
  routed: { route: Route; msg: Message }[];
  logger: MemoryLogger;
}

function harness(overrides: Partial<SessionCommandOptions> = {}): Harness {
  const logger = new MemoryLogger();
  const sent: Uint8Array[] = [];
  const routed: { route: Route; msg: Message }[] = [];
  const command = new SessionCommand({
    serializer: 'protobuf',
    heartbeatSeconds: 30,
    messageCodec: jsonCodec,
    schema,
    onDataRoute: (_agent, route, msg) => {
      routed.push({ route, msg });
    },
    logger,
    ...overrides,
  });
  const agent = new Agent({ sid: 's-1', write: bytes => sent.push(bytes) });
  logger.drain();
  return { command, agent, sent, routed, logger };
}

function packet(type: Packet['type'], value?: unknown): Packet {
  const data = value === undefined ? new Uint8Array(0) : new Uint8Array(Buffer.from(JSON.stringify(value)));
  return { type, data };
}

function handshakeBody(frame: Uint8Array): { code: number; sys: Record<string, unknown> } {
  return JSON.parse(Buffer.from(frame.subarray(HEADER_LENGTH)).toString('utf8'));
}

const dataPacket = packet(PacketType.Data, { id: 7, route: 'area.playerHandler.info' });

function tick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('SessionCommand negotiation', () => {
  it('sends the lean frame only to clients holding the current version', () => {
    const { command } = harness();
    const full = command.handshakeBytes();
    const lean = command.handshakeBytes(true);

    assert.ok(lean.length < full.length);
    assert.deepEqual(command.negotiate(42), { lean: true, bytes: lean });
    assert.deepEqual(command.negotiate(0), { lean: false, bytes: full });
    assert.deepEqual(command.negotiate(41), { lean: false, bytes: full });
  });

  it('answers a handshake packet according to the declared version', () => {
    const lean = harness();
    lean.command.handle(lean.agent, packet(PacketType.Handshake, { sys: { protoVersion: 42 } }));
    assert.deepEqual(lean.sent, [lean.command.handshakeBytes(true)]);
    assert.equal(lean.agent.getState(), 'wait_ack');

    const nulled = harness();
    nulled.command.handle(nulled.agent, packet(PacketType.Handshake, { sys: { protoVersion: 42, type: null } }));
    assert.deepEqual(nulled.sent, [nulled.command.handshakeBytes(true)]);

    const absent = harness();
    absent.command.handle(absent.agent, packet(PacketType.Handshake, { sys: { type: 'js' } }));
    assert.deepEqual(absent.sent, [absent.command.handshakeBytes()]);

    const garbage = harness();
    garbage.command.handle(garbage.agent, { type: PacketType.Handshake, data: new Uint8Array([0x7b]) });
    assert.deepEqual(garbage.sent, [garbage.command.handshakeBytes()]);
    assert.equal(garbage.agent.getState(), 'wait_ack');
  });

  it('never sends the lean frame without a schema', () => {
    const { command } = harness({ schema: undefined });
    assert.equal(command.getProtoVersion(), 0);
    assert.deepEqual(command.negotiate(0), { lean: false, bytes: command.handshakeBytes() });
    assert.equal('protos' in handshakeBody(command.handshakeBytes()).sys, false);
  });

  it('advertises heartbeat, dictionary and serializer, letting host entries win', () => {
    const { command } = harness({
      dictionary: { getDictionary: () => ({ 'area.playerHandler.info': 1 }) },
      sys: { serializer: 'json', region: 'eu', protos: 'ignored' },
    });
    assert.deepEqual(command.sysData(), {
      heartbeat: 30,
      dict: { 'area.playerHandler.info': 1 },
      serializer: 'json',
      region: 'eu',
    });
    const sys = handshakeBody(command.handshakeBytes()).sys;
    assert.equal(sys['serializer'], 'json');
    assert.equal(sys['heartbeat'], 30);
    assert.deepEqual(sys['protos'], {
      version: 42,
      server: { 'area.playerHandler.info': { 'optional string name': 1 } },
      client: {},
    });
  });

  it('swaps schema and frames together', () => {
    const { command, logger } = harness();
    command.replaceSchema({ ...schema, version: 43 });
    assert.equal(command.getProtoVersion(), 43);
    assert.equal(command.negotiate(42).lean, false);
    assert.equal(command.negotiate(43).lean, true);
    assert.deepEqual(logger.actions(), ['session.schema_replaced']);
  });
});

describe('SessionCommand schema source', () => {
  const fixtures = path.join(path.dirname(url.fileURLToPath(import.meta.url)), '..', 'schema', 'fixtures');

  it('prefers a precompiled schema over proto options', () => {
    const logger = new MemoryLogger();
    const command = new SessionCommand({
      serializer: 'protobuf',
      schema,
      proto: { ...defaultProtoOptions(), dir: fixtures },
      logger,
    });
    assert.equal(command.getSchema(), schema);
    assert.ok(logger.actions().includes('session.proto_skipped'));
    assert.equal(logger.actions().includes('proto.schema_built'), false);
  });

  it('compiles proto options when no schema is given', () => {
    const command = new SessionCommand({
      serializer: 'protobuf',
      proto: { ...defaultProtoOptions(), dir: fixtures, version: 9, serverRoutes: { 'a.b.c': 'Item' } },
    });
    assert.equal(command.getProtoVersion(), 9);
    assert.deepEqual([...(command.getSchema()?.server.keys() ?? [])], ['a.b.c']);
  });

  it('starts without a schema when compilation fails', () => {
    const logger = new MemoryLogger();
    const command = new SessionCommand({
      serializer: 'protobuf',
      proto: { ...defaultProtoOptions(), dir: path.join(fixtures, 'absent') },
      logger,
    });
    assert.equal(command.getSchema(), undefined);
    assert.ok(logger.actions().includes('session.proto_failed'));
  });
});

describe('SessionCommand packet handling', () => {
  it('drops data before the handshake ack and dispatches it after', () => {
    const { command, agent, sent, routed } = harness();
    command.handle(agent, packet(PacketType.Handshake, { sys: { protoVersion: 42 } }));
    sent.length = 0;

    command.handle(agent, dataPacket);
    assert.deepEqual(sent, []);
    assert.deepEqual(routed, []);

    command.handle(agent, packet(PacketType.HandshakeAck));
    assert.equal(agent.getState(), 'working');
    command.handle(agent, dataPacket);
    assert.deepEqual(sent, []);
    assert.deepEqual(routed, [{
      route: { nodeType: 'area', handlerName: 'playerHandler', method: 'info' },
      msg: { id: 7, route: 'area.playerHandler.info', body: new Uint8Array(0) },
    }]);
  });

  it('drops undecodable messages and routes without closing', () => {
    const { command, agent, routed, logger } = harness();
    agent.setState('working');
    logger.drain();

    command.handle(agent, { type: PacketType.Data, data: new Uint8Array([1, 2, 3]) });
    command.handle(agent, packet(PacketType.Data, { id: 1, route: 'bogus' }));

    assert.deepEqual(routed, []);
    assert.equal(agent.getState(), 'working');
    assert.deepEqual(logger.actions(), ['session.data_dropped', 'session.data_dropped']);
    assert.deepEqual(logger.entries.map(e => e.detail['reason']), ['message decode failed', 'route decode failed']);
  });

  it('drops data when no message codec is configured', () => {
    const { command, agent, routed, logger } = harness({ messageCodec: undefined });
    agent.setState('working');
    logger.drain();
    command.handle(agent, dataPacket);
    assert.deepEqual(routed, []);
    assert.deepEqual(logger.entries.map(e => [e.level, e.detail['reason']]), [['warn', 'no message codec']]);
  });

  it('logs route handler failures, sync or async', async () => {
    const sync = harness({ onDataRoute: () => { throw new Error('handler blew up'); } });
    sync.agent.setState('working');
    sync.logger.drain();
    sync.command.handle(sync.agent, dataPacket);
    assert.deepEqual(sync.logger.actions(), ['session.route_failed']);

    const deferred = harness({ onDataRoute: async () => { throw new Error('later'); } });
    deferred.agent.setState('working');
    deferred.logger.drain();
    deferred.command.handle(deferred.agent, dataPacket);
    await tick();
    assert.deepEqual(deferred.logger.entries.map(e => [e.action, e.detail['error']]), [['session.route_failed', 'later']]);
  });

  it('warns when data arrives with no route function', () => {
    const { command, agent, logger } = harness({ onDataRoute: undefined });
    agent.setState('working');
    logger.drain();
    command.handle(agent, dataPacket);
    assert.deepEqual(logger.actions(), ['session.data_unrouted']);
  });

  it('echoes heartbeats', () => {
    const { command, agent, sent } = harness();
    command.handle(agent, packet(PacketType.Heartbeat));
    assert.deepEqual(sent.map(b => [...b]), [[3, 0, 0, 0]]);
    assert.deepEqual(command.heartbeatBytes(), packets.encode(PacketType.Heartbeat));
  });

  it('ignores kick packets unless the host installs a handler', () => {
    const plain = harness();
    plain.command.handle(plain.agent, packet(PacketType.Kick));
    assert.deepEqual(plain.logger.actions(), ['session.unhandled_packet']);

    const kicked: SessionAgent[] = [];
    const custom = harness({
      packetHandlers: { [PacketType.Kick]: agent => { kicked.push(agent); } },
    });
    custom.command.handle(custom.agent, packet(PacketType.Kick));
    assert.deepEqual(kicked, [custom.agent]);
  });

  it('lets host handlers replace the built-in ones', () => {
    const seen: number[] = [];
    const { command, agent, sent } = harness({
      packetHandlers: { [PacketType.Heartbeat]: (_agent, p) => { seen.push(p.type); } },
    });
    command.handle(agent, packet(PacketType.Heartbeat));
    assert.deepEqual(seen, [PacketType.Heartbeat]);
    assert.deepEqual(sent, []);
  });
});
