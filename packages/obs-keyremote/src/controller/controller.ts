import type { InputDeviceSubsystem } from '@/input/types';
import type { RemoteControlClient } from '@/obs/remoteControl';
import type { ApplicationProcessManager } from '@/process/applicationProcess';
import { ActionDispatcher } from './actionDispatcher';
import { DeviceWatcher } from './deviceWatcher';
import { ReconnectSupervisor } from './reconnectSupervisor';
import { ControllerSession } from './session';

export interface ControllerTimings {
  longPressThresholdMs: number;
  reconnectDelayMs: number;
  deviceScanIntervalMs: number;
  toggleCooldownMs: number;
}

export interface ControllerDependencies {
  remote: RemoteControlClient;
  input: InputDeviceSubsystem;
  processes: ApplicationProcessManager;
}

export interface Controller {
  session: ControllerSession;
  dispatcher: ActionDispatcher;
  supervisor: ReconnectSupervisor;
  watcher: DeviceWatcher;
  start(): void;
  stop(): Promise<void>;
}

export function createController(params: {
  triggerCode: number;
  timings: ControllerTimings;
  dependencies: ControllerDependencies;
}): Controller {
  const { triggerCode, timings, dependencies } = params;

  const session = new ControllerSession();
  const dispatcher = new ActionDispatcher(session, dependencies.remote, dependencies.processes, {
    toggleCooldownMs: timings.toggleCooldownMs,
  });
  const supervisor = new ReconnectSupervisor(session, dependencies.remote, {
    reconnectDelayMs: timings.reconnectDelayMs,
  });
  const watcher = new DeviceWatcher(session, dependencies.input, dispatcher, {
    triggerCode,
    scanIntervalMs: timings.deviceScanIntervalMs,
    longPressThresholdMs: timings.longPressThresholdMs,
  });

  return {
    session,
    dispatcher,
    supervisor,
    watcher,
    start() {
      supervisor.start();
      watcher.start();
    },
    async stop() {
      supervisor.stop();
      await watcher.stop();
      await dependencies.remote.disconnect();
      session.markDisconnected('controller stopped');
    },
  };
}
