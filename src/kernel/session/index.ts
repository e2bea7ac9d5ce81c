export { SessionCommand, DEFAULT_HEARTBEAT_SECONDS } from './command.ts';
export { Agent } from './agent.ts';
export { SessionServer } from './transport.ts';
export { PacketType, FramePacketCodec, PacketDecoder, isPacketType, HEADER_LENGTH, MAX_BODY_LENGTH } from './packet.ts';
export { buildHandshakeBundle, parseClientHandshake, HANDSHAKE_OK, SysKey } from './handshake.ts';
export type { PacketHandler, SessionCommandOptions } from './command.ts';
export type { AgentOptions, ByteWriter } from './agent.ts';
export type { ConnectionSocket } from './transport.ts';
export type { Packet, PacketCodec } from './packet.ts';
export type { HandshakeBundle } from './handshake.ts';
export type {
  AgentState,
  ClientHandshake,
  ClientHandshakeSys,
  DataRouteFunc,
  Message,
  MessageCodec,
  Route,
  RouteDictionary,
  SessionAgent,
} from './types.ts';
