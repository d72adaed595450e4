/**
 * Controller-specific types
 */

import type { EventClassifier } from './eventClassifier';

export interface ControllerOptions {
  host: string;
  port: number;
  password: string;
  /** evdev key code that drives the controller */
  triggerCode: number;
}

/**
 * Device tracking for the watcher
 */
export interface MonitoredDevice {
  path: string;
  name: string;
  classifier: EventClassifier;
}

/**
 * Bookkeeping for one in-flight key press
 */
export interface PressWindow {
  startTime: number;
  longPressFired: boolean;
}

export type DispatchOutcome =
  | { type: 'recording-toggled' }
  | { type: 'dropped'; reason: 'disconnected' | 'cooldown' | 'rpc-error' }
  | { type: 'close-refused-recording'; pid: number }
  | { type: 'closing'; pid: number }
  | { type: 'already-closed'; pid: number }
  | { type: 'launched' }
  | { type: 'failed'; errorMessage: string };

export interface PressActions {
  toggleRecording(source: string): Promise<DispatchOutcome>;
  toggleApplication(source: string): Promise<DispatchOutcome>;
}
