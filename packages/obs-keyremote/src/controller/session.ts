import { logger } from '@/ui/logger';
import type { EventClassifier } from './eventClassifier';
import type { MonitoredDevice } from './types';

/**
 * Mutable state shared by every controller component.
 *
 * Writers:
 * - `connected`: only the reconnect supervisor sets it true; anyone may
 *   set it false after a control-channel failure.
 * - `lastToggleTime`: only the action dispatcher.
 * - `devices`: the watcher inserts, each classifier removes its own entry.
 */
export class ControllerSession {
  private connectedState = false;
  private lastToggleTimeState: number | null = null;
  private readonly monitored = new Map<string, MonitoredDevice>();

  get connected(): boolean {
    return this.connectedState;
  }

  get lastToggleTime(): number | null {
    return this.lastToggleTimeState;
  }

  markConnected(): void {
    this.connectedState = true;
  }

  markDisconnected(reason: string): void {
    if (this.connectedState) {
      logger.debug(`[SESSION] Control channel marked disconnected: ${reason}`);
    }
    this.connectedState = false;
  }

  /**
   * Claims the application toggle slot. Returns false (and changes nothing)
   * when the previous toggle is less than `cooldownMs` old.
   */
  tryBeginToggle(now: number, cooldownMs: number): boolean {
    if (this.lastToggleTimeState !== null && now - this.lastToggleTimeState < cooldownMs) {
      return false;
    }
    this.lastToggleTimeState = now;
    return true;
  }

  isMonitored(path: string): boolean {
    return this.monitored.has(path);
  }

  registerDevice(device: MonitoredDevice): void {
    this.monitored.set(device.path, device);
  }

  /** Removes the entry for `path` only if it still belongs to `classifier` */
  releaseDevice(path: string, classifier: EventClassifier): void {
    if (this.monitored.get(path)?.classifier === classifier) {
      this.monitored.delete(path);
    }
  }

  get devices(): MonitoredDevice[] {
    return Array.from(this.monitored.values());
  }
}
