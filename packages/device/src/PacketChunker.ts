/**
 * @fileoverview Fixed-size packet transmission of device messages.
 *
 * The launch monitor delivers each message as a burst of USB transfer units
 * with a short gap between them. Packet boundaries carry no meaning: they can
 * fall anywhere, including inside a multi-byte character.
 */

import type { Socket } from 'node:net';
import { TransportError } from '@shot-relay/protocol';
import {
  type Clock,
  DEFAULT_PACKET_DELAY_MS,
  DEFAULT_PACKET_SIZE,
  systemClock,
} from '@shot-relay/shared';

/**
 * Connection the chunker writes packets to.
 */
export interface PacketSink {
  /** False once the underlying connection has closed */
  readonly isOpen: boolean;
  /** Write one packet. Rejects with a TransportError if the connection fails. */
  write(packet: Uint8Array): Promise<void>;
}

/**
 * Result of sending one message.
 */
export interface SendStats {
  readonly packets: number;
  readonly bytes: number;
  /** Clock time when the first packet was written */
  readonly startedAt: number;
  /** Clock time when the last packet was written */
  readonly completedAt: number;
}

export interface PacketChunkerOptions {
  /** Maximum packet size in bytes (default: 64) */
  readonly packetSize?: number;
  /** Pause between packets of one message (default: 1.5ms) */
  readonly packetDelayMs?: number;
  readonly clock?: Clock;
}

function assertPacketSize(packetSize: number): void {
  if (!Number.isInteger(packetSize) || packetSize < 1) {
    throw new RangeError(`Packet size must be a positive integer, got ${packetSize}`);
  }
}

/**
 * Split a message into packets of at most `packetSize` bytes, in order.
 * Only the last packet may be shorter.
 */
export function chunkMessage(message: string | Uint8Array, packetSize: number): Buffer[] {
  assertPacketSize(packetSize);

  const bytes = typeof message === 'string' ? Buffer.from(message, 'utf8') : Buffer.from(message);
  const packets: Buffer[] = [];
  for (let offset = 0; offset < bytes.length; offset += packetSize) {
    packets.push(bytes.subarray(offset, offset + packetSize));
  }
  return packets;
}

/**
 * Sends messages as packet bursts.
 *
 * Messages to the same sink are transmitted one after another, so packets of
 * two messages never interleave on one connection.
 */
export class PacketChunker {
  readonly packetSize: number;
  readonly packetDelayMs: number;
  private readonly clock: Clock;
  private readonly tails = new WeakMap<PacketSink, Promise<void>>();

  constructor(options: PacketChunkerOptions = {}) {
    this.packetSize = options.packetSize ?? DEFAULT_PACKET_SIZE;
    this.packetDelayMs = options.packetDelayMs ?? DEFAULT_PACKET_DELAY_MS;
    this.clock = options.clock ?? systemClock;
    assertPacketSize(this.packetSize);
  }

  /**
   * Send one message. Waits for earlier messages to the same sink first.
   * @throws {TransportError} if the connection is or becomes closed
   */
  send(sink: PacketSink, message: string): Promise<SendStats> {
    const previous = this.tails.get(sink) ?? Promise.resolve();
    const result = previous.then(() => this.transmit(sink, message));
    // The queue only orders transmissions; failures reach the caller through `result`.
    this.tails.set(
      sink,
      result.then(
        () => undefined,
        () => undefined
      )
    );
    return result;
  }

  private async transmit(sink: PacketSink, message: string): Promise<SendStats> {
    const packets = chunkMessage(message, this.packetSize);
    const startedAt = this.clock.now();
    let bytes = 0;

    for (const [index, packet] of packets.entries()) {
      if (!sink.isOpen) {
        throw new TransportError(
          `connection closed after ${index} of ${packets.length} packets`
        );
      }
      await sink.write(packet);
      bytes += packet.length;

      if (index < packets.length - 1) {
        await this.clock.sleep(this.packetDelayMs);
      }
    }

    return { packets: packets.length, bytes, startedAt, completedAt: this.clock.now() };
  }
}

/**
 * Packet sink backed by a TCP socket.
 */
export function createSocketSink(socket: Socket): PacketSink {
  return {
    get isOpen(): boolean {
      return !socket.destroyed && socket.writable;
    },
    write(packet: Uint8Array): Promise<void> {
      return new Promise((resolve, reject) => {
        socket.write(packet, (error) => {
          if (error) {
            reject(new TransportError(error.message, { cause: error }));
          } else {
            resolve();
          }
        });
      });
    },
  };
}
