// src/kernel/session/types.ts
import type { Packet } from './packet.ts';

/**
 * Connection states. The session command only drives `wait_ack` and
 * `working`; `init` and `closed` belong to whoever owns the socket.
 */
export type AgentState = 'init' | 'wait_ack' | 'working' | 'closed';

export interface SessionAgent {
  readonly sid: string;
  readonly uid: number;
  readonly remoteAddr: string;
  getState(): AgentState;
  setState(state: AgentState): void;
  sendRaw(bytes: Uint8Array): void;
}

/** Decoded application envelope; `body` stays serialized. */
export interface Message {
  id: number;
  route: string;
  body: Uint8Array;
}

export interface Route {
  nodeType: string;
  handlerName: string;
  method: string;
}

/** Envelope codec supplied by the host. Both methods throw on malformed input. */
export interface MessageCodec {
  decode(bytes: Uint8Array): Message;
  decodeRoute(route: string): Route;
}

export interface RouteDictionary {
  getDictionary(): Record<string, number>;
}

export type DataRouteFunc = (agent: SessionAgent, route: Route, msg: Message) => void | Promise<void>;

export interface ClientHandshakeSys {
  type?: string;
  version?: string;
  protoVersion: number;
  rsa?: Record<string, unknown>;
}

export interface ClientHandshake {
  sys: ClientHandshakeSys;
  user?: Record<string, unknown>;
}

export type { Packet };
