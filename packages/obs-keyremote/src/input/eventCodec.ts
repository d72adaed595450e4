import { EV_KEY, EV_SYN, KEY_DOWN, KEY_REPEAT, KEY_UP, SYN_DROPPED, SYN_REPORT, type InputEvent } from './types';

/**
 * `struct input_event` is a `struct timeval` followed by u16 type, u16 code
 * and s32 value. The timeval fields are machine words.
 */
export function inputEventSize(wordBits: 32 | 64): number {
  return wordBits === 64 ? 24 : 16;
}

export function hostWordBits(arch: string = process.arch): 32 | 64 {
  return ['arm64', 'x64', 'ppc64', 'riscv64', 's390x', 'loong64', 'mips64el'].includes(arch) ? 64 : 32;
}

export class InputEventDecoder {
  private pending: Buffer = Buffer.alloc(0);
  private readonly recordSize: number;

  constructor(private readonly wordBits: 32 | 64 = hostWordBits()) {
    this.recordSize = inputEventSize(wordBits);
  }

  /** Decodes every complete record, keeping a trailing partial one for the next chunk */
  push(chunk: Buffer): InputEvent[] {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const events: InputEvent[] = [];

    let offset = 0;
    while (offset + this.recordSize <= data.length) {
      events.push(this.decodeAt(data, offset));
      offset += this.recordSize;
    }

    this.pending = Buffer.from(data.subarray(offset));
    return events;
  }

  private decodeAt(data: Buffer, offset: number): InputEvent {
    let seconds: number;
    let micros: number;
    let cursor: number;
    if (this.wordBits === 64) {
      seconds = Number(data.readBigInt64LE(offset));
      micros = Number(data.readBigInt64LE(offset + 8));
      cursor = offset + 16;
    } else {
      seconds = data.readInt32LE(offset);
      micros = data.readInt32LE(offset + 4);
      cursor = offset + 8;
    }

    return {
      timestampMs: seconds * 1000 + Math.floor(micros / 1000),
      type: data.readUInt16LE(cursor),
      code: data.readUInt16LE(cursor + 2),
      value: data.readInt32LE(cursor + 4),
    };
  }
}

/**
 * Mirror of a device's held keys, built from its own event stream.
 * Key changes are applied a whole SYN_REPORT frame at a time. A SYN_DROPPED
 * means transitions were lost: the mirror is cleared and every event up to
 * and including the next SYN_REPORT is ignored, so a key only counts as held
 * again after a fresh key-down.
 */
export class KeyStateTracker {
  private readonly held = new Set<number>();
  private frame: InputEvent[] = [];
  private dropping = false;

  apply(event: InputEvent): void {
    if (event.type === EV_SYN) {
      if (event.code === SYN_DROPPED) {
        this.dropping = true;
        this.frame = [];
        this.held.clear();
        return;
      }
      if (event.code === SYN_REPORT) {
        if (!this.dropping) {
          this.commit();
        }
        this.dropping = false;
        this.frame = [];
      }
      return;
    }

    if (event.type === EV_KEY && !this.dropping) {
      this.frame.push(event);
    }
  }

  snapshot(): ReadonlySet<number> {
    return new Set(this.held);
  }

  private commit(): void {
    for (const event of this.frame) {
      if (event.value === KEY_DOWN || event.value === KEY_REPEAT) {
        this.held.add(event.code);
      } else if (event.value === KEY_UP) {
        this.held.delete(event.code);
      }
    }
  }
}

/**
 * Parses a sysfs capability bitmap such as "120013" or "ffff 0 fffffffe":
 * hex machine words, most significant first.
 */
export function parseCapabilityBitmap(text: string, wordBits: 32 | 64 = hostWordBits()): Set<number> {
  const bits = new Set<number>();
  const words = text.trim().split(/\s+/).filter(Boolean).reverse();

  words.forEach((word, wordIndex) => {
    let value = BigInt(`0x${word}`);
    let bit = 0;
    while (value > 0n) {
      if (value & 1n) {
        bits.add(wordIndex * wordBits + bit);
      }
      value >>= 1n;
      bit++;
    }
  });

  return bits;
}
