// src/kernel/session/agent.ts
import { SILENT_LOGGER, isLevelEnabled } from '../log/logger.ts';
import type { LogSink } from '../log/logger.ts';
import type { AgentState, SessionAgent } from './types.ts';

export type ByteWriter = (bytes: Uint8Array) => void;

export interface AgentOptions {
  sid: string;
  uid?: number;
  remoteAddr?: string;
  write: ByteWriter;
  logger?: LogSink;
}

export class Agent implements SessionAgent {
  readonly sid: string;
  readonly remoteAddr: string;
  private userId: number;
  private state: AgentState = 'init';
  private readonly write: ByteWriter;
  private readonly logger: LogSink;

  constructor(opts: AgentOptions) {
    this.sid = opts.sid;
    this.userId = opts.uid ?? 0;
    this.remoteAddr = opts.remoteAddr ?? '';
    this.write = opts.write;
    this.logger = opts.logger ?? SILENT_LOGGER;
  }

  get uid(): number {
    return this.userId;
  }

  bind(uid: number): void {
    this.userId = uid;
  }

  getState(): AgentState {
    return this.state;
  }

  setState(state: AgentState): void {
    if (this.state === state) return;
    const previous = this.state;
    this.state = state;
    if (isLevelEnabled(this.logger, 'debug')) {
      this.logger.log({
        level: 'debug',
        action: 'agent.state',
        detail: { sid: this.sid, uid: this.userId, from: previous, to: state },
      });
    }
  }

  sendRaw(bytes: Uint8Array): void {
    if (this.state === 'closed') {
      this.logger.log({
        level: 'warn',
        action: 'agent.send_after_close',
        detail: { sid: this.sid, uid: this.userId, bytes: bytes.length },
      });
      return;
    }
    this.write(bytes);
  }
}
