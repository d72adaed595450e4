/**
 * Global configuration for obs-keyremote
 *
 * Centralizes the timing constants and paths the controller runs with.
 * Every value can be overridden from the environment, which keeps the CLI
 * flag surface limited to the connection settings and the trigger key.
 */

import { z } from 'zod';
import packageJson from '../package.json';

const durationMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvironmentSchema = z.object({
  OBS_KEYREMOTE_LONG_PRESS_MS: durationMs(1_000),
  OBS_KEYREMOTE_RECONNECT_DELAY_MS: durationMs(2_000),
  OBS_KEYREMOTE_SCAN_INTERVAL_MS: durationMs(2_000),
  OBS_KEYREMOTE_TOGGLE_COOLDOWN_MS: durationMs(2_000),
  OBS_KEYREMOTE_CONNECT_TIMEOUT_MS: durationMs(5_000),
  OBS_KEYREMOTE_INPUT_POLL_MS: durationMs(10),
  OBS_KEYREMOTE_OBS_EXEC: z.string().min(1).default('obs'),
  OBS_KEYREMOTE_OBS_PROCESS: z.string().min(1).default('obs'),
  OBS_KEYREMOTE_INPUT_DIR: z.string().min(1).default('/dev/input'),
  OBS_KEYREMOTE_SYSFS_INPUT_DIR: z.string().min(1).default('/sys/class/input'),
});

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

class Configuration {
  /** A press still held after this long is a long press */
  public readonly longPressThresholdMs: number;
  public readonly reconnectDelayMs: number;
  public readonly deviceScanIntervalMs: number;
  /** Minimum spacing between two application launch/close actions */
  public readonly toggleCooldownMs: number;
  public readonly connectTimeoutMs: number;
  /** Idle devices are re-read after this long */
  public readonly inputPollIntervalMs: number;

  public readonly applicationExecutable: string;
  public readonly applicationProcessName: string;

  public readonly inputDeviceDir: string;
  public readonly sysfsInputDir: string;

  public readonly currentCliVersion: string;
  public readonly programName = 'obs-keyremote';

  constructor(env: NodeJS.ProcessEnv) {
    const parsed = EnvironmentSchema.safeParse(env);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(`Invalid environment variable ${issue.path.join('.')}: ${issue.message}`);
    }
    const values = parsed.data;

    this.longPressThresholdMs = values.OBS_KEYREMOTE_LONG_PRESS_MS;
    this.reconnectDelayMs = values.OBS_KEYREMOTE_RECONNECT_DELAY_MS;
    this.deviceScanIntervalMs = values.OBS_KEYREMOTE_SCAN_INTERVAL_MS;
    this.toggleCooldownMs = values.OBS_KEYREMOTE_TOGGLE_COOLDOWN_MS;
    this.connectTimeoutMs = values.OBS_KEYREMOTE_CONNECT_TIMEOUT_MS;
    this.inputPollIntervalMs = values.OBS_KEYREMOTE_INPUT_POLL_MS;

    this.applicationExecutable = values.OBS_KEYREMOTE_OBS_EXEC;
    this.applicationProcessName = values.OBS_KEYREMOTE_OBS_PROCESS.toLowerCase();

    this.inputDeviceDir = values.OBS_KEYREMOTE_INPUT_DIR;
    this.sysfsInputDir = values.OBS_KEYREMOTE_SYSFS_INPUT_DIR;

    this.currentCliVersion = packageJson.version;
  }
}

export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): Configuration {
  return new Configuration(env);
}

export type { Configuration };
