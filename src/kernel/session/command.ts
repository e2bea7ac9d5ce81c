// src/kernel/session/command.ts
import { SILENT_LOGGER, isLevelEnabled } from '../log/logger.ts';
import type { LogSink } from '../log/logger.ts';
import { compileProtos } from '../schema/parser.ts';
import { hasProtoConfig } from '../schema/options.ts';
import type { ProtoOptions } from '../schema/options.ts';
import type { ProtoSchema } from '../schema/types.ts';
import { SysKey, buildHandshakeBundle, parseClientHandshake } from './handshake.ts';
import type { HandshakeBundle } from './handshake.ts';
import { PacketType, FramePacketCodec } from './packet.ts';
import type { Packet, PacketCodec } from './packet.ts';
import type {
  DataRouteFunc,
  Message,
  MessageCodec,
  Route,
  RouteDictionary,
  SessionAgent,
} from './types.ts';

export type PacketHandler = (agent: SessionAgent, packet: Packet, command: SessionCommand) => void;

export const DEFAULT_HEARTBEAT_SECONDS = 60;

export interface SessionCommandOptions {
  /** Name of the active body serializer, advertised to clients. */
  serializer: string;
  /** Route compression dictionary; empty when absent. */
  dictionary?: RouteDictionary;
  /** Without one, every Data packet is dropped. */
  messageCodec?: MessageCodec;
  heartbeatSeconds?: number;
  /** Compiled at construction when `schema` is absent. */
  proto?: ProtoOptions;
  /** Precompiled schema; takes precedence over `proto`. */
  schema?: ProtoSchema;
  /** Extra handshake `sys` entries; they win over the built-in ones. */
  sys?: Record<string, unknown>;
  packetCodec?: PacketCodec;
  onDataRoute?: DataRouteFunc;
  /** Replace built-in handlers per packet type. */
  packetHandlers?: Partial<Record<PacketType, PacketHandler>>;
  logger?: LogSink;
}

const DEFAULT_HANDLERS: Readonly<Record<PacketType, PacketHandler | undefined>> = {
  [PacketType.Handshake]: handshakeCommand,
  [PacketType.HandshakeAck]: handshakeAckCommand,
  [PacketType.Heartbeat]: heartbeatCommand,
  [PacketType.Data]: dataCommand,
  [PacketType.Kick]: undefined,
};

/**
 * Protocol state shared by every connection of one server. Everything is
 * fixed at construction except the schema, which `replaceSchema` swaps
 * together with the handshake frames derived from it.
 */
export class SessionCommand {
  readonly logger: LogSink;
  readonly messageCodec: MessageCodec | undefined;
  readonly onDataRoute: DataRouteFunc;
  private readonly packetCodec: PacketCodec;
  private readonly sys: Readonly<Record<string, unknown>>;
  private readonly handlers: ReadonlyMap<PacketType, PacketHandler>;
  private readonly heartbeatFrame: Uint8Array;
  private bundle: HandshakeBundle;

  constructor(opts: SessionCommandOptions) {
    this.logger = opts.logger ?? SILENT_LOGGER;
    this.messageCodec = opts.messageCodec;
    this.onDataRoute = opts.onDataRoute ?? this.unroutedData;
    this.packetCodec = opts.packetCodec ?? new FramePacketCodec();

    const sys: Record<string, unknown> = {
      [SysKey.Heartbeat]: opts.heartbeatSeconds ?? DEFAULT_HEARTBEAT_SECONDS,
      [SysKey.Dict]: opts.dictionary?.getDictionary() ?? {},
      [SysKey.Serializer]: opts.serializer,
      ...opts.sys,
    };
    delete sys[SysKey.Protos];
    this.sys = Object.freeze(sys);

    const handlers = new Map<PacketType, PacketHandler>();
    for (const type of Object.values(PacketType)) {
      const handler = opts.packetHandlers?.[type] ?? DEFAULT_HANDLERS[type];
      if (handler) handlers.set(type, handler);
    }
    this.handlers = handlers;

    this.heartbeatFrame = this.packetCodec.encode(PacketType.Heartbeat);
    this.bundle = buildHandshakeBundle(this.packetCodec, this.sys, this.resolveSchema(opts));

    this.logger.log({
      level: 'info',
      action: 'session.init',
      detail: {
        heartbeat: this.sys[SysKey.Heartbeat],
        serializer: this.sys[SysKey.Serializer],
        proto_version: this.getProtoVersion(),
        handshake_bytes: this.bundle.full.length,
        handshake_lean_bytes: this.bundle.lean.length,
      },
    });
  }

  handle(agent: SessionAgent, packet: Packet): void {
    const handler = this.handlers.get(packet.type);
    if (!handler) {
      this.logger.log({
        level: 'warn',
        action: 'session.unhandled_packet',
        detail: { sid: agent.sid, uid: agent.uid, type: packet.type },
      });
      return;
    }
    handler(agent, packet, this);
  }

  getSchema(): ProtoSchema | undefined {
    return this.bundle.schema;
  }

  /** 0 when no schema is loaded. */
  getProtoVersion(): number {
    return this.bundle.schema?.version ?? 0;
  }

  handshakeBytes(lean = false): Uint8Array {
    return lean ? this.bundle.lean : this.bundle.full;
  }

  /** Picks the handshake frame for a client that already holds `clientVersion`. */
  negotiate(clientVersion: number): { lean: boolean; bytes: Uint8Array } {
    const bundle = this.bundle;
    const serverVersion = bundle.schema?.version ?? 0;
    const lean = clientVersion > 0 && clientVersion === serverVersion;
    return { lean, bytes: lean ? bundle.lean : bundle.full };
  }

  heartbeatBytes(): Uint8Array {
    return this.heartbeatFrame;
  }

  sysData(): Readonly<Record<string, unknown>> {
    return this.sys;
  }

  /**
   * Installs a new schema. Connections already past the handshake keep the
   * schema they were sent.
   */
  replaceSchema(schema: ProtoSchema): void {
    const previous = this.getProtoVersion();
    this.bundle = buildHandshakeBundle(this.packetCodec, this.sys, schema);
    this.logger.log({
      level: 'info',
      action: 'session.schema_replaced',
      detail: { from: previous, to: schema.version, handshake_bytes: this.bundle.full.length },
    });
  }

  private resolveSchema(opts: SessionCommandOptions): ProtoSchema | undefined {
    if (opts.schema) {
      if (opts.proto && hasProtoConfig(opts.proto)) {
        this.logger.log({
          level: 'info',
          action: 'session.proto_skipped',
          detail: { reason: 'precompiled schema supplied' },
        });
      }
      return opts.schema;
    }
    if (!opts.proto) return undefined;
    try {
      return compileProtos(opts.proto, this.logger);
    } catch (err: unknown) {
      this.logger.log({
        level: 'error',
        action: 'session.proto_failed',
        detail: { error: err instanceof Error ? err.message : String(err) },
      });
      return undefined;
    }
  }

  private readonly unroutedData: DataRouteFunc = (agent, route, msg) => {
    this.logger.log({
      level: 'warn',
      action: 'session.data_unrouted',
      detail: { sid: agent.sid, uid: agent.uid, route: msg.route, handler: route.handlerName },
    });
  };
}

function handshakeCommand(agent: SessionAgent, packet: Packet, command: SessionCommand): void {
  agent.setState('wait_ack');

  const declared = parseClientHandshake(packet.data);
  const clientVersion = declared?.sys.protoVersion ?? 0;
  const { lean, bytes } = command.negotiate(clientVersion);

  if (isLevelEnabled(command.logger, 'debug')) {
    command.logger.log({
      level: 'debug',
      action: lean ? 'session.handshake_lean' : 'session.handshake_full',
      detail: {
        sid: agent.sid,
        uid: agent.uid,
        address: agent.remoteAddr,
        client_version: clientVersion,
        server_version: command.getProtoVersion(),
        parsed: declared !== undefined,
      },
    });
  }

  agent.sendRaw(bytes);
}

function handshakeAckCommand(agent: SessionAgent, _packet: Packet, command: SessionCommand): void {
  agent.setState('working');
  if (isLevelEnabled(command.logger, 'debug')) {
    command.logger.log({
      level: 'debug',
      action: 'session.handshake_ack',
      detail: { sid: agent.sid, uid: agent.uid, address: agent.remoteAddr },
    });
  }
}

function heartbeatCommand(agent: SessionAgent, _packet: Packet, command: SessionCommand): void {
  agent.sendRaw(command.heartbeatBytes());
}

function dataCommand(agent: SessionAgent, packet: Packet, command: SessionCommand): void {
  const state = agent.getState();
  if (state !== 'working') {
    command.logger.log({
      level: 'debug',
      action: 'session.data_dropped',
      detail: { sid: agent.sid, uid: agent.uid, state, reason: 'not working' },
    });
    return;
  }

  const codec = command.messageCodec;
  if (!codec) {
    command.logger.log({
      level: 'warn',
      action: 'session.data_dropped',
      detail: { sid: agent.sid, uid: agent.uid, state, reason: 'no message codec' },
    });
    return;
  }

  let msg: Message;
  let route: Route;
  try {
    msg = codec.decode(packet.data);
  } catch (err: unknown) {
    logDecodeFailure(command, agent, packet, 'message', err);
    return;
  }
  try {
    route = codec.decodeRoute(msg.route);
  } catch (err: unknown) {
    logDecodeFailure(command, agent, packet, 'route', err);
    return;
  }

  let result: void | Promise<void>;
  try {
    result = command.onDataRoute(agent, route, msg);
  } catch (err: unknown) {
    logRouteFailure(command, agent, msg.route, err);
    return;
  }
  if (result instanceof Promise) {
    result.catch((err: unknown) => logRouteFailure(command, agent, msg.route, err));
  }
}

function logDecodeFailure(
  command: SessionCommand,
  agent: SessionAgent,
  packet: Packet,
  stage: 'message' | 'route',
  err: unknown,
): void {
  command.logger.log({
    level: 'debug',
    action: 'session.data_dropped',
    detail: {
      sid: agent.sid,
      uid: agent.uid,
      reason: `${stage} decode failed`,
      bytes: packet.data.length,
      error: err instanceof Error ? err.message : String(err),
    },
  });
}

function logRouteFailure(command: SessionCommand, agent: SessionAgent, route: string, err: unknown): void {
  command.logger.log({
    level: 'error',
    action: 'session.route_failed',
    detail: {
      sid: agent.sid,
      uid: agent.uid,
      route,
      error: err instanceof Error ? err.message : String(err),
    },
  });
}
