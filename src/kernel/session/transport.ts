// src/kernel/session/transport.ts
import { randomUUID } from 'crypto';
import * as net from 'net';
import { Agent } from './agent.ts';
import type { SessionCommand } from './command.ts';
import { PacketDecoder } from './packet.ts';

/** The slice of `net.Socket` the server relies on. */
export interface ConnectionSocket {
  readonly remoteAddress?: string | undefined;
  readonly remotePort?: number | undefined;
  write(data: Uint8Array): boolean;
  destroy(): void;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export class SessionServer {
  private readonly command: SessionCommand;
  private readonly server: net.Server;
  private readonly agents = new Map<string, { agent: Agent; socket: ConnectionSocket }>();

  constructor(command: SessionCommand) {
    this.command = command;
    this.server = net.createServer(sock => {
      this.attach(sock);
    });
  }

  async listen(port: number, host = '0.0.0.0'): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    for (const { socket } of this.agents.values()) socket.destroy();
    this.agents.clear();
    if (!this.server.listening) return;
    return new Promise((resolve, reject) => {
      this.server.close(err => (err ? reject(err) : resolve()));
    });
  }

  connectionCount(): number {
    return this.agents.size;
  }

  attach(socket: ConnectionSocket): Agent {
    const logger = this.command.logger;
    const address = socket.remoteAddress
      ? `${socket.remoteAddress}:${socket.remotePort ?? 0}`
      : 'unknown';
    const agent = new Agent({
      sid: randomUUID(),
      remoteAddr: address,
      write: bytes => {
        socket.write(bytes);
      },
      logger,
    });
    const decoder = new PacketDecoder(logger);
    this.agents.set(agent.sid, { agent, socket });

    socket.on('data', chunk => {
      for (const packet of decoder.handleData(chunk)) {
        if (agent.getState() === 'closed') return;
        this.command.handle(agent, packet);
      }
    });
    socket.on('close', () => {
      agent.setState('closed');
      this.agents.delete(agent.sid);
    });
    socket.on('error', err => {
      logger.log({
        level: 'warn',
        action: 'transport.socket_error',
        detail: { sid: agent.sid, address, error: err.message },
      });
    });
    return agent;
  }
}
