import os from 'node:os';

import type { Configuration } from '@/configuration';
import { LinuxInputSubsystem } from '@/input/linuxInput';
import { ObsRemoteControlClient } from '@/obs/remoteControl';
import { LocalApplicationProcessManager } from '@/process/applicationProcess';
import { logger } from '@/ui/logger';
import { createController } from './controller';
import type { ControllerOptions } from './types';

type ShutdownSource = 'os-signal' | 'exception';

export async function startController(options: ControllerOptions, configuration: Configuration): Promise<void> {
  // Control flow is:
  // 1. Create promise that will resolve when shutdown is requested
  // 2. Setup signal handlers to resolve this promise with the source of the shutdown
  // 3. Start the loops and await this promise
  // 4. When it resolves we stop the loops and exit
  let requestShutdown: (source: ShutdownSource, errorMessage?: string) => void = () => {};
  const resolvesWhenShutdownRequested = new Promise<{ source: ShutdownSource; errorMessage?: string }>((resolve) => {
    requestShutdown = (source, errorMessage) => {
      logger.debug(`[RUN] Requesting shutdown (source: ${source}, errorMessage: ${errorMessage})`);

      // Force the exit if cleanup hangs
      setTimeout(() => {
        logger.debug('[RUN] Cleanup did not finish in time, forcing exit');
        process.exit(source === 'exception' ? 1 : 0);
      }, 1_000).unref();

      resolve({ source, errorMessage });
    };
  });

  process.on('SIGINT', () => {
    logger.debug('[RUN] Received SIGINT');
    requestShutdown('os-signal');
  });

  process.on('SIGTERM', () => {
    logger.debug('[RUN] Received SIGTERM');
    requestShutdown('os-signal');
  });

  process.on('uncaughtException', (error) => {
    logger.error(`Fatal: ${error.message}`);
    logger.debug(`[RUN] Stack trace: ${error.stack}`);
    requestShutdown('exception', error.message);
  });

  // Reported, not fatal
  process.on('unhandledRejection', (reason) => {
    logger.warn('Unhandled promise rejection:', reason);
  });

  logger.debugLargeJson('[RUN] Starting controller', {
    version: configuration.currentCliVersion,
    platform: os.platform(),
    host: options.host,
    port: options.port,
    triggerCode: options.triggerCode,
    longPressThresholdMs: configuration.longPressThresholdMs,
    reconnectDelayMs: configuration.reconnectDelayMs,
    deviceScanIntervalMs: configuration.deviceScanIntervalMs,
    toggleCooldownMs: configuration.toggleCooldownMs,
    applicationExecutable: configuration.applicationExecutable,
  });

  const controller = createController({
    triggerCode: options.triggerCode,
    timings: {
      longPressThresholdMs: configuration.longPressThresholdMs,
      reconnectDelayMs: configuration.reconnectDelayMs,
      deviceScanIntervalMs: configuration.deviceScanIntervalMs,
      toggleCooldownMs: configuration.toggleCooldownMs,
    },
    dependencies: {
      remote: new ObsRemoteControlClient({
        host: options.host,
        port: options.port,
        password: options.password,
        connectTimeoutMs: configuration.connectTimeoutMs,
      }),
      input: new LinuxInputSubsystem({
        inputDeviceDir: configuration.inputDeviceDir,
        sysfsInputDir: configuration.sysfsInputDir,
        pollIntervalMs: configuration.inputPollIntervalMs,
      }),
      processes: new LocalApplicationProcessManager({
        processName: configuration.applicationProcessName,
        executable: configuration.applicationExecutable,
        selfName: configuration.programName,
      }),
    },
  });

  controller.start();
  logger.info(`Waiting for key ${options.triggerCode} on input devices (OBS WebSocket at ${options.host}:${options.port})`);

  const shutdownRequest = await resolvesWhenShutdownRequested;
  logger.debug(`[RUN] Stopping controller (source: ${shutdownRequest.source})`);
  try {
    await controller.stop();
  } catch (error) {
    logger.debug('[RUN] Cleanup failed:', error);
  }
  process.exit(shutdownRequest.source === 'exception' ? 1 : 0);
}
