import { supportsKey, type InputDeviceSubsystem } from '@/input/types';
import { logger } from '@/ui/logger';
import { startNonOverlappingInterval } from '@/utils/time';
import { EventClassifier } from './eventClassifier';
import type { ControllerSession } from './session';
import type { PressActions } from './types';

export type ScanReport = {
  started: string[];
  rejected: string[];
  failed: Array<{ path: string; error: string }>;
};

export class DeviceWatcher {
  private stopInterval: (() => void) | null = null;

  constructor(
    private readonly session: ControllerSession,
    private readonly input: InputDeviceSubsystem,
    private readonly actions: PressActions,
    private readonly options: {
      triggerCode: number;
      scanIntervalMs: number;
      longPressThresholdMs: number;
    },
  ) {}

  start(): void {
    if (this.stopInterval) {
      return;
    }
    this.stopInterval = startNonOverlappingInterval(
      async () => {
        await this.scan();
      },
      this.options.scanIntervalMs,
      (error) => logger.debug('[WATCHER] Scan failed unexpectedly:', error),
    );
  }

  /** Stops scanning and ends every running classifier */
  async stop(): Promise<void> {
    this.stopInterval?.();
    this.stopInterval = null;
    await Promise.all(this.session.devices.map(device => device.classifier.stop()));
  }

  async scan(): Promise<ScanReport> {
    const report: ScanReport = { started: [], rejected: [], failed: [] };

    let paths: string[];
    try {
      paths = await this.input.listDevices();
    } catch (error) {
      logger.debug('[WATCHER] Failed to list input devices:', error);
      return report;
    }

    for (const path of paths) {
      if (this.session.isMonitored(path)) {
        continue;
      }
      try {
        if (await this.tryMonitor(path)) {
          report.started.push(path);
        } else {
          report.rejected.push(path);
        }
      } catch (error) {
        // Permission denied or a transient I/O error: retried on the next scan.
        const errorMessage = error instanceof Error ? error.message : String(error);
        logger.debug(`[WATCHER] Skipping ${path}: ${errorMessage}`);
        report.failed.push({ path, error: errorMessage });
      }
    }

    return report;
  }

  private async tryMonitor(path: string): Promise<boolean> {
    const device = await this.input.open(path);

    let eligible = false;
    try {
      eligible = supportsKey(await device.capabilities(), this.options.triggerCode);
    } finally {
      if (!eligible) {
        await device.close();
      }
    }
    if (!eligible) {
      return false;
    }

    // Another scan may have claimed the path while capabilities were read.
    if (this.session.isMonitored(path)) {
      await device.close();
      return false;
    }

    const classifier = new EventClassifier({
      device,
      triggerCode: this.options.triggerCode,
      longPressThresholdMs: this.options.longPressThresholdMs,
      session: this.session,
      actions: this.actions,
    });
    this.session.registerDevice({ path, name: device.name, classifier });
    logger.info(`Monitoring: ${device.name}`);
    void classifier.start();
    return true;
  }
}
