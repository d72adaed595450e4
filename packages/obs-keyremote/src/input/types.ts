/**
 * Input device types (Linux evdev model)
 */

export const EV_SYN = 0x00;
export const EV_KEY = 0x01;

export const SYN_REPORT = 0;
export const SYN_DROPPED = 3;

export const KEY_UP = 0;
export const KEY_DOWN = 1;
export const KEY_REPEAT = 2;

export interface InputEvent {
  type: number;
  code: number;
  value: number;
  /** Kernel timestamp in milliseconds */
  timestampMs: number;
}

/** Event type -> supported codes of that type */
export type DeviceCapabilities = ReadonlyMap<number, ReadonlySet<number>>;

export interface InputDeviceHandle {
  readonly path: string;
  readonly name: string;
  capabilities(): Promise<DeviceCapabilities>;
  /** Key codes the device currently reports as held */
  activeKeys(): Promise<ReadonlySet<number>>;
  /**
   * Events in hardware order. Ends when the handle is closed and throws
   * once the device is gone; it cannot be restarted (open the path again).
   */
  readEvents(): AsyncIterable<InputEvent>;
  close(): Promise<void>;
}

export interface InputDeviceSubsystem {
  listDevices(): Promise<string[]>;
  open(path: string): Promise<InputDeviceHandle>;
}

export function supportsKey(capabilities: DeviceCapabilities, code: number): boolean {
  return capabilities.get(EV_KEY)?.has(code) ?? false;
}
