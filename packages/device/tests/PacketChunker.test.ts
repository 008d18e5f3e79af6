import { TransportError } from '@shot-relay/protocol';
import { VirtualClock } from '@shot-relay/shared';
import { createRecordingSink } from '@shot-relay/testing';
import { describe, expect, it } from 'vitest';
import { chunkMessage, PacketChunker } from '../src/PacketChunker.js';

describe('chunkMessage', () => {
  it('should split into full packets with a shorter last packet', () => {
    const packets = chunkMessage('abcdefghij', 4);
    expect(packets.map((packet) => packet.toString('utf8'))).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('should produce a single packet for short messages', () => {
    expect(chunkMessage('0M\n\t', 64)).toHaveLength(1);
  });

  it('should produce no packets for an empty message', () => {
    expect(chunkMessage('', 64)).toEqual([]);
  });

  it('should rejoin to the original bytes for every packet size', () => {
    const message = 'SHOT_ID=1\nSPEED_MPH=150.00\nnoté: wörld\n\t';
    const original = Buffer.from(message, 'utf8');

    for (let size = 1; size <= original.length + 1; size++) {
      const packets = chunkMessage(message, size);
      expect(Buffer.concat(packets).equals(original)).toBe(true);
      expect(packets.every((packet) => packet.length <= size)).toBe(true);
    }
  });

  it('should reject packet sizes that are not positive integers', () => {
    expect(() => chunkMessage('abc', 0)).toThrow(RangeError);
    expect(() => chunkMessage('abc', 1.5)).toThrow('Packet size must be a positive integer, got 1.5');
  });
});

describe('PacketChunker', () => {
  it('should reject an invalid packet size at construction', () => {
    expect(() => new PacketChunker({ packetSize: -1 })).toThrow(RangeError);
  });

  it('should pause between packets but not after the last', async () => {
    const clock = new VirtualClock();
    const sink = createRecordingSink(clock);
    const chunker = new PacketChunker({ packetSize: 64, packetDelayMs: 1.5, clock });

    const stats = await chunker.send(sink, 'x'.repeat(150));

    expect(stats).toEqual({ packets: 3, bytes: 150, startedAt: 0, completedAt: 3 });
    expect(sink.packets.map((packet) => packet.data.length)).toEqual([64, 64, 22]);
    expect(sink.packets.map((packet) => packet.at)).toEqual([0, 1.5, 3]);
    expect(clock.requestedSleeps).toEqual([1.5, 1.5]);
  });

  it('should not interleave messages sent to the same sink', async () => {
    const clock = new VirtualClock();
    const sink = createRecordingSink(clock);
    const chunker = new PacketChunker({ packetSize: 8, clock });

    const first = chunker.send(sink, 'A'.repeat(40));
    const second = chunker.send(sink, 'B'.repeat(40));
    await Promise.all([first, second]);

    expect(sink.text()).toBe(`${'A'.repeat(40)}${'B'.repeat(40)}`);
  });

  it('should fail with a transport error when the sink closes mid-message', async () => {
    const sink = createRecordingSink();
    sink.closeAfter(1);
    const chunker = new PacketChunker({ packetSize: 64, clock: new VirtualClock() });

    const sending = chunker.send(sink, 'x'.repeat(150));

    await expect(sending).rejects.toThrow(TransportError);
    await expect(sending).rejects.toThrow(
      'Transport error: connection closed after 1 of 3 packets'
    );
    expect(sink.packets).toHaveLength(1);
  });

  it('should keep serving other sinks after one fails', async () => {
    const clock = new VirtualClock();
    const closed = createRecordingSink(clock);
    closed.close();
    const open = createRecordingSink(clock);
    const chunker = new PacketChunker({ clock });

    await expect(chunker.send(closed, 'lost')).rejects.toThrow(TransportError);
    await chunker.send(open, 'kept');

    expect(open.text()).toBe('kept');
  });
});
