import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { execFileSync } from 'node:child_process';
import { closeSync, constants, mkdirSync, openSync, rmSync, writeFileSync, writeSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

vi.mock('@/ui/logger', () => ({
  logger: {
    debug: vi.fn(),
  },
}));

import { LinuxInputSubsystem } from './linuxInput';
import { EV_KEY, EV_SYN, type InputDeviceHandle, type InputEvent } from './types';

function record64(type: number, code: number, value: number): Buffer {
  const buffer = Buffer.alloc(24);
  buffer.writeBigInt64LE(100n, 0);
  buffer.writeBigInt64LE(0n, 8);
  buffer.writeUInt16LE(type, 16);
  buffer.writeUInt16LE(code, 18);
  buffer.writeInt32LE(value, 20);
  return buffer;
}

describe('LinuxInputSubsystem', () => {
  let root: string;
  let devDir: string;
  let sysfsDir: string;
  let subsystem: LinuxInputSubsystem;

  function addDevice(node: string, name: string | null, capabilities: { ev?: string; key?: string }): string {
    const path = join(devDir, node);
    writeFileSync(path, Buffer.alloc(0));
    const deviceDir = join(sysfsDir, node, 'device');
    mkdirSync(join(deviceDir, 'capabilities'), { recursive: true });
    if (name !== null) {
      writeFileSync(join(deviceDir, 'name'), `${name}\n`);
    }
    if (capabilities.ev !== undefined) {
      writeFileSync(join(deviceDir, 'capabilities', 'ev'), `${capabilities.ev}\n`);
    }
    if (capabilities.key !== undefined) {
      writeFileSync(join(deviceDir, 'capabilities', 'key'), `${capabilities.key}\n`);
    }
    return path;
  }

  beforeEach(() => {
    root = join(tmpdir(), `obs-keyremote-input-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    devDir = join(root, 'dev');
    sysfsDir = join(root, 'sys');
    mkdirSync(devDir, { recursive: true });
    mkdirSync(sysfsDir, { recursive: true });
    subsystem = new LinuxInputSubsystem({ inputDeviceDir: devDir, sysfsInputDir: sysfsDir, pollIntervalMs: 5, wordBits: 64 });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('lists event nodes in numeric order', async () => {
    addDevice('event10', 'Mouse', {});
    addDevice('event2', 'Keypad', {});
    writeFileSync(join(devDir, 'mice'), '');
    mkdirSync(join(devDir, 'by-id'));

    await expect(subsystem.listDevices()).resolves.toEqual([join(devDir, 'event2'), join(devDir, 'event10')]);
  });

  it('reads the name and key capabilities from sysfs', async () => {
    const path = addDevice('event3', 'USB Keypad', { ev: '120013', key: '10000000' });

    const device = await subsystem.open(path);
    try {
      expect(device.name).toBe('USB Keypad');
      const capabilities = await device.capabilities();
      expect(capabilities.get(EV_KEY)).toEqual(new Set([28]));
      expect(capabilities.get(EV_SYN)).toEqual(new Set());
    } finally {
      await device.close();
    }
  });

  it('reports no key capabilities for devices without EV_KEY', async () => {
    const path = addDevice('event4', null, { ev: '5' });

    const device = await subsystem.open(path);
    try {
      expect(device.name).toBe(path);
      expect((await device.capabilities()).has(EV_KEY)).toBe(false);
    } finally {
      await device.close();
    }
  });

  it('fails to open a missing node', async () => {
    await expect(subsystem.open(join(devDir, 'event99'))).rejects.toThrow('ENOENT');
  });

  it('streams events, tracks held keys and fails when the stream ends', async () => {
    const path = addDevice('event5', 'Pedal', { ev: '3', key: '10000000' });
    writeFileSync(path, Buffer.concat([
      record64(EV_KEY, 28, 1),
      record64(EV_SYN, 0, 0),
      record64(EV_KEY, 30, 1),
      record64(EV_SYN, 0, 0),
      record64(EV_KEY, 30, 0),
      record64(EV_SYN, 0, 0),
    ]));

    const device = await subsystem.open(path);
    const events: InputEvent[] = [];
    try {
      await expect((async () => {
        for await (const event of device.readEvents()) {
          events.push(event);
        }
      })()).rejects.toThrow(`Event stream of ${path} ended`);

      expect(events.filter(event => event.type === EV_KEY).map(event => [event.code, event.value])).toEqual([
        [28, 1],
        [30, 1],
        [30, 0],
      ]);
      expect(events[0].timestampMs).toBe(100_000);
      await expect(device.activeKeys()).resolves.toEqual(new Set([28]));
    } finally {
      await device.close();
    }
  });

  describe('idle devices', () => {
    const writers: number[] = [];
    const devices: InputDeviceHandle[] = [];

    // A FIFO held open for writing never reaches end-of-file, like an idle event node.
    function addIdleDevice(node: string): string {
      const path = join(devDir, node);
      execFileSync('mkfifo', [path]);
      writers.push(openSync(path, constants.O_RDWR));
      return path;
    }

    afterEach(async () => {
      await Promise.all(devices.splice(0).map(device => device.close()));
      writers.splice(0).forEach(fd => closeSync(fd));
    });

    it('keeps filesystem work responsive while many devices wait for events', async () => {
      const paths = ['event0', 'event1', 'event2', 'event3', 'event4', 'event5'].map(addIdleDevice);
      for (const path of paths) {
        const device = await subsystem.open(path);
        devices.push(device);
        void device.readEvents()[Symbol.asyncIterator]().next();
      }
      await new Promise(resolve => setTimeout(resolve, 50));

      await expect(subsystem.listDevices()).resolves.toEqual(paths);
      await expect(readdir(devDir)).resolves.toHaveLength(6);
    });

    it('delivers events written after the reader went idle', async () => {
      const path = addIdleDevice('event7');
      const device = await subsystem.open(path);
      devices.push(device);
      const events = device.readEvents()[Symbol.asyncIterator]();
      const first = events.next();

      await new Promise(resolve => setTimeout(resolve, 30));
      writeSync(writers[0], Buffer.concat([record64(EV_KEY, 164, 1), record64(EV_SYN, 0, 0)]));

      await expect(first).resolves.toEqual({
        done: false,
        value: { type: EV_KEY, code: 164, value: 1, timestampMs: 100_000 },
      });
      await expect(events.next()).resolves.toEqual({
        done: false,
        value: { type: EV_SYN, code: 0, value: 0, timestampMs: 100_000 },
      });
      await expect(device.activeKeys()).resolves.toEqual(new Set([164]));
    });

    it('closes promptly and ends the stream while no events arrive', async () => {
      const path = addIdleDevice('event8');
      const device = await subsystem.open(path);
      const pending = device.readEvents()[Symbol.asyncIterator]().next();
      await new Promise(resolve => setTimeout(resolve, 30));

      await device.close();

      await expect(pending).resolves.toEqual({ done: true, value: undefined });
    });
  });
});
