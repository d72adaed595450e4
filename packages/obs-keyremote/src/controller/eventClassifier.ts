/**
 * Per-device press classifier
 *
 * Turns the trigger key's down/up events into short presses (released
 * before the threshold) and long presses (still held when the threshold
 * elapses). The long-press check re-reads the device's live key state
 * when its timer fires, so a key-up that races the timer can never produce
 * a long press for a released key.
 */

import { EV_KEY, EV_SYN, KEY_DOWN, KEY_UP, SYN_DROPPED, SYN_REPORT, type InputDeviceHandle, type InputEvent } from '@/input/types';
import { logger } from '@/ui/logger';
import { delay } from '@/utils/time';
import type { ControllerSession } from './session';
import type { PressActions, PressWindow } from './types';

export interface EventClassifierOptions {
  device: InputDeviceHandle;
  triggerCode: number;
  longPressThresholdMs: number;
  session: ControllerSession;
  actions: PressActions;
  now?: () => number;
}

export class EventClassifier {
  private window: PressWindow | null = null;
  /** Set between a SYN_DROPPED and the next SYN_REPORT */
  private resyncing = false;
  private readonly inFlight = new Set<Promise<unknown>>();
  private running: Promise<void> | null = null;
  private readonly now: () => number;

  constructor(private readonly options: EventClassifierOptions) {
    this.now = options.now ?? Date.now;
  }

  get device(): InputDeviceHandle {
    return this.options.device;
  }

  /** Resolves once the read loop has ended and the device is deregistered */
  get done(): Promise<void> {
    return this.running ?? Promise.resolve();
  }

  start(): Promise<void> {
    if (!this.running) {
      this.running = this.run();
    }
    return this.running;
  }

  async stop(): Promise<void> {
    await this.options.device.close();
    await this.done;
  }

  /** Waits for every dispatch and long-press check started so far */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  handleEvent(event: InputEvent): void {
    if (event.type === EV_SYN) {
      if (event.code === SYN_DROPPED) {
        // Lost events may include the trigger's key-up; the press is abandoned.
        this.window = null;
        this.resyncing = true;
      } else if (event.code === SYN_REPORT) {
        this.resyncing = false;
      }
      return;
    }
    if (this.resyncing || event.type !== EV_KEY || event.code !== this.options.triggerCode) {
      return;
    }

    if (event.value === KEY_DOWN) {
      this.onKeyDown();
    } else if (event.value === KEY_UP) {
      this.onKeyUp();
    }
  }

  private async run(): Promise<void> {
    const { device, session } = this.options;
    try {
      for await (const event of device.readEvents()) {
        this.handleEvent(event);
      }
    } catch (error) {
      logger.debug(`[CLASSIFIER] Event stream of ${device.path} failed:`, error);
    } finally {
      session.releaseDevice(device.path, this);
      try {
        await device.close();
      } catch (error) {
        logger.debug(`[CLASSIFIER] Failed to close ${device.path}:`, error);
      }
      logger.info(`Device removed: ${device.name}`);
    }
  }

  private onKeyDown(): void {
    // A newer key-down replaces the previous window; its pending check becomes a no-op.
    const window: PressWindow = { startTime: this.now(), longPressFired: false };
    this.window = window;
    this.track(this.checkLongPress(window));
  }

  private onKeyUp(): void {
    const window = this.window;
    this.window = null;
    if (!window || window.longPressFired) {
      return;
    }

    const duration = this.now() - window.startTime;
    if (duration < this.options.longPressThresholdMs && this.options.session.connected) {
      this.track(this.options.actions.toggleRecording(this.options.device.name));
    }
  }

  private async checkLongPress(window: PressWindow): Promise<void> {
    await delay(this.options.longPressThresholdMs);
    if (this.window !== window) {
      return;
    }

    let activeKeys: ReadonlySet<number>;
    try {
      activeKeys = await this.options.device.activeKeys();
    } catch (error) {
      logger.debug(`[CLASSIFIER] Could not read active keys of ${this.options.device.path}:`, error);
      return;
    }
    if (this.window !== window || !activeKeys.has(this.options.triggerCode)) {
      return;
    }

    window.longPressFired = true;
    logger.info('Hold detected: Toggling OBS Application.');
    await this.options.actions.toggleApplication(this.options.device.name);
  }

  private track(task: Promise<unknown>): void {
    const tracked = task
      .catch((error: unknown) => {
        logger.warn(`Action on ${this.options.device.name} failed:`, error);
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }
}
