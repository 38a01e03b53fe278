/**
 * Fixed-capacity ring of sequenced agent messages, one per session.
 *
 * Single writer (the session's read loop), any number of readers.
 * Sequence numbers start at 0, are assigned here at append time and are
 * never reused. Two eviction triggers:
 *
 *   1. slot count: the ring holds at most `capacity` messages
 *   2. byte ceiling: total payload bytes stay under `maxBytes` (the
 *      newest message is always kept)
 *
 * Each slot records the sequence number written into it. Readers check that
 * number before copying, so a slot recycled by the writer is reported as
 * truncation instead of being returned as the wrong message. Entries are
 * frozen on append, so a reader's snapshot can never be mutated afterwards.
 */

import type { AgentMessage, ReadResult, SequencedMessage } from "./types.js";

export const DEFAULT_BUFFER_CAPACITY = 1000;
export const DEFAULT_BUFFER_MAX_BYTES = 1024 * 1024;

interface Slot {
  readonly seq: number;
  readonly bytes: number;
  readonly entry: SequencedMessage;
}

export class MessageBuffer {
  private readonly slots: Array<Slot | undefined>;
  private nextSeqValue = 0;
  private oldestSeqValue = 0;
  private totalBytes = 0;

  constructor(
    readonly capacity = DEFAULT_BUFFER_CAPACITY,
    readonly maxBytes = DEFAULT_BUFFER_MAX_BYTES,
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`MessageBuffer capacity must be a positive integer (received ${capacity})`);
    }
    if (!Number.isInteger(maxBytes) || maxBytes <= 0) {
      throw new RangeError(`MessageBuffer maxBytes must be a positive integer (received ${maxBytes})`);
    }
    this.slots = new Array<Slot | undefined>(capacity);
  }

  append(message: AgentMessage, byteSize?: number, timestamp = Date.now()): number {
    const seq = this.nextSeqValue;
    const bytes = byteSize ?? Buffer.byteLength(JSON.stringify(message), "utf8");
    const index = seq % this.capacity;

    const previous = this.slots[index];
    if (previous && previous.seq >= this.oldestSeqValue) {
      // Ring is full: the slot being recycled holds the oldest retained message.
      this.totalBytes -= previous.bytes;
      this.oldestSeqValue = previous.seq + 1;
    }

    const entry: SequencedMessage = Object.freeze({ seq, timestamp, message: Object.freeze(message) });
    this.slots[index] = Object.freeze({ seq, bytes, entry });
    this.totalBytes += bytes;
    this.nextSeqValue = seq + 1;

    while (this.totalBytes > this.maxBytes && this.oldestSeqValue < seq) {
      const oldest = this.slots[this.oldestSeqValue % this.capacity];
      if (oldest && oldest.seq === this.oldestSeqValue) {
        this.totalBytes -= oldest.bytes;
      }
      this.oldestSeqValue += 1;
    }

    return seq;
  }

  /**
   * Read up to `limit` messages starting at sequence number `offset`.
   * Offsets below the retained floor are reported as truncated and the read
   * resumes from the floor.
   */
  read(offset: number, limit: number): ReadResult {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`offset must be a non-negative integer (received ${offset})`);
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer (received ${limit})`);
    }

    const floor = this.oldestSeqValue;
    const end = this.nextSeqValue;
    let truncated = false;
    let start = offset;
    if (start < floor) {
      truncated = true;
      start = floor;
    }

    const messages: SequencedMessage[] = [];
    const stop = Math.min(end, start + limit);
    let cursor = start;
    for (let seq = start; seq < stop; seq += 1) {
      const slot = this.slots[seq % this.capacity];
      if (!slot || slot.seq !== seq) {
        // Recycled since the floor was sampled.
        truncated = true;
        cursor = seq + 1;
        continue;
      }
      messages.push(slot.entry);
      cursor = seq + 1;
    }

    return {
      messages,
      truncated,
      nextOffset: stop > start ? cursor : start,
      oldestSeq: floor,
      nextSeq: end,
    };
  }

  /** The last `count` retained messages, oldest first. */
  tail(count: number): ReadResult {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`count must be a positive integer (received ${count})`);
    }
    const start = Math.max(this.oldestSeqValue, this.nextSeqValue - count);
    return this.read(start, count);
  }

  /** Retained messages, newest first, until `predicate` has matched `limit` of them. */
  findRecent(predicate: (entry: SequencedMessage) => boolean, limit: number): SequencedMessage[] {
    const found: SequencedMessage[] = [];
    for (let seq = this.nextSeqValue - 1; seq >= this.oldestSeqValue && found.length < limit; seq -= 1) {
      const slot = this.slots[seq % this.capacity];
      if (slot && slot.seq === seq && predicate(slot.entry)) {
        found.push(slot.entry);
      }
    }
    return found;
  }

  get size(): number {
    return this.nextSeqValue - this.oldestSeqValue;
  }

  get bytes(): number {
    return this.totalBytes;
  }

  get oldestSeq(): number {
    return this.oldestSeqValue;
  }

  get nextSeq(): number {
    return this.nextSeqValue;
  }

  get totalAppended(): number {
    return this.nextSeqValue;
  }
}
