/**
 * Linux evdev input subsystem
 *
 * Device nodes come from /dev/input, names and capability bitmaps from
 * sysfs. Events are decoded straight from the device node.
 *
 * Nodes are opened non-blocking and polled, so an idle node never holds a
 * libuv pool thread. Character devices cannot back a net.Socket.
 */

import { constants } from 'node:fs';
import { open, readdir, readFile, type FileHandle } from 'node:fs/promises';
import { basename, join } from 'node:path';

import { logger } from '@/ui/logger';
import { hostWordBits, InputEventDecoder, inputEventSize, KeyStateTracker, parseCapabilityBitmap } from './eventCodec';
import { EV_KEY, type DeviceCapabilities, type InputDeviceHandle, type InputDeviceSubsystem, type InputEvent } from './types';

const EVENT_NODE_PATTERN = /^event(\d+)$/;
const READ_BATCH_EVENTS = 64;

async function readSysfsText(path: string): Promise<string | null> {
  try {
    return (await readFile(path, 'utf-8')).trim();
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

class LinuxInputDevice implements InputDeviceHandle {
  private readonly keyState = new KeyStateTracker();
  private reading = false;
  private closed = false;
  private wake: (() => void) | null = null;

  constructor(
    readonly path: string,
    readonly name: string,
    private readonly handle: FileHandle,
    private readonly sysfsDeviceDir: string,
    private readonly wordBits: 32 | 64,
    private readonly pollIntervalMs: number,
  ) {}

  async capabilities(): Promise<DeviceCapabilities> {
    const capabilityDir = join(this.sysfsDeviceDir, 'capabilities');
    const evBitmap = await readSysfsText(join(capabilityDir, 'ev'));
    const eventTypes = evBitmap === null ? new Set<number>() : parseCapabilityBitmap(evBitmap, this.wordBits);

    const capabilities = new Map<number, ReadonlySet<number>>();
    for (const type of eventTypes) {
      capabilities.set(type, new Set<number>());
    }

    if (eventTypes.has(EV_KEY)) {
      const keyBitmap = await readSysfsText(join(capabilityDir, 'key'));
      capabilities.set(EV_KEY, keyBitmap === null ? new Set<number>() : parseCapabilityBitmap(keyBitmap, this.wordBits));
    }

    return capabilities;
  }

  async activeKeys(): Promise<ReadonlySet<number>> {
    return this.keyState.snapshot();
  }

  async *readEvents(): AsyncIterable<InputEvent> {
    if (this.reading) {
      throw new Error(`Event stream of ${this.path} is already being read`);
    }
    this.reading = true;

    const decoder = new InputEventDecoder(this.wordBits);
    const buffer = Buffer.alloc(inputEventSize(this.wordBits) * READ_BATCH_EVENTS);
    while (!this.closed) {
      let bytesRead: number;
      try {
        ({ bytesRead } = await this.handle.read(buffer, 0, buffer.length, null));
      } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code === 'EAGAIN' || err.code === 'EWOULDBLOCK') {
          await this.waitForData();
          continue;
        }
        if (this.closed) {
          return;
        }
        throw error;
      }
      if (bytesRead === 0) {
        throw new Error(`Event stream of ${this.path} ended`);
      }

      for (const event of decoder.push(buffer.subarray(0, bytesRead))) {
        this.keyState.apply(event);
        yield event;
      }
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.wake?.();
    await this.handle.close();
  }

  /** Sleeps one poll interval, or until the device is closed */
  private waitForData(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, this.pollIntervalMs);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}

export class LinuxInputSubsystem implements InputDeviceSubsystem {
  constructor(
    private readonly options: {
      inputDeviceDir: string;
      sysfsInputDir: string;
      pollIntervalMs: number;
      wordBits?: 32 | 64;
    },
  ) {}

  async listDevices(): Promise<string[]> {
    const entries = await readdir(this.options.inputDeviceDir);
    return entries
      .map(entry => ({ entry, match: EVENT_NODE_PATTERN.exec(entry) }))
      .filter((item): item is { entry: string; match: RegExpExecArray } => item.match !== null)
      .sort((a, b) => Number(a.match[1]) - Number(b.match[1]))
      .map(item => join(this.options.inputDeviceDir, item.entry));
  }

  async open(path: string): Promise<InputDeviceHandle> {
    const handle = await open(path, constants.O_RDONLY | constants.O_NONBLOCK);
    const sysfsDeviceDir = join(this.options.sysfsInputDir, basename(path), 'device');

    let name = path;
    try {
      name = (await readSysfsText(join(sysfsDeviceDir, 'name'))) || path;
    } catch (error) {
      logger.debug(`[INPUT] Could not read name of ${path}:`, error);
    }

    return new LinuxInputDevice(
      path,
      name,
      handle,
      sysfsDeviceDir,
      this.options.wordBits ?? hostWordBits(),
      this.options.pollIntervalMs,
    );
  }
}
