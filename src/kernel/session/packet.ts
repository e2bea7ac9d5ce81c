// src/kernel/session/packet.ts
import { SILENT_LOGGER } from '../log/logger.ts';
import type { LogSink } from '../log/logger.ts';

export const PacketType = {
  Handshake: 1,
  HandshakeAck: 2,
  Heartbeat: 3,
  Data: 4,
  Kick: 5,
} as const;

export type PacketType = (typeof PacketType)[keyof typeof PacketType];

export interface Packet {
  type: PacketType;
  data: Uint8Array;
}

export interface PacketCodec {
  encode(type: PacketType, body?: Uint8Array): Uint8Array;
}

export const HEADER_LENGTH = 4;
export const MAX_BODY_LENGTH = 0xffffff;

export function isPacketType(value: number): value is PacketType {
  return value >= PacketType.Handshake && value <= PacketType.Kick;
}

/** 1-byte type, 3-byte big-endian body length, body. */
export class FramePacketCodec implements PacketCodec {
  encode(type: PacketType, body: Uint8Array = new Uint8Array(0)): Uint8Array {
    if (!isPacketType(type)) throw new Error(`Unknown packet type: ${String(type)}`);
    if (body.length > MAX_BODY_LENGTH) {
      throw new Error(`Packet body too large: ${body.length} > ${MAX_BODY_LENGTH}`);
    }
    const frame = Buffer.alloc(HEADER_LENGTH + body.length);
    frame.writeUInt8(type, 0);
    frame.writeUIntBE(body.length, 1, 3);
    frame.set(body, HEADER_LENGTH);
    return frame;
  }
}

/** Reassembles packets from a byte stream; one decoder per connection. */
export class PacketDecoder {
  private buffer = Buffer.alloc(0);
  private readonly logger: LogSink;

  constructor(logger: LogSink = SILENT_LOGGER) {
    this.logger = logger;
  }

  handleData(chunk: Uint8Array): Packet[] {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const packets: Packet[] = [];
    while (true) {
      if (this.buffer.length < HEADER_LENGTH) break;
      const type = this.buffer.readUInt8(0);
      const length = this.buffer.readUIntBE(1, 3);
      if (this.buffer.length < HEADER_LENGTH + length) break;
      const data = new Uint8Array(this.buffer.subarray(HEADER_LENGTH, HEADER_LENGTH + length));
      this.buffer = this.buffer.subarray(HEADER_LENGTH + length);
      if (!isPacketType(type)) {
        this.logger.log({
          level: 'warn',
          action: 'packet.unknown_type',
          detail: { type, length },
        });
        continue;
      }
      packets.push({ type, data });
    }
    return packets;
  }

  pending(): number {
    return this.buffer.length;
  }
}
