import type { RemoteControlClient } from '@/obs/remoteControl';
import type { ApplicationProcessManager } from '@/process/applicationProcess';
import { logger } from '@/ui/logger';
import type { ControllerSession } from './session';
import type { DispatchOutcome, PressActions } from './types';

export class ActionDispatcher implements PressActions {
  constructor(
    private readonly session: ControllerSession,
    private readonly remote: RemoteControlClient,
    private readonly processes: ApplicationProcessManager,
    private readonly options: {
      toggleCooldownMs: number;
      now?: () => number;
    },
  ) {}

  async toggleRecording(source: string): Promise<DispatchOutcome> {
    if (!this.session.connected) {
      logger.debug(`[DISPATCH] Dropping record toggle from ${source}: not connected`);
      return { type: 'dropped', reason: 'disconnected' };
    }

    logger.info(`[${source}] Toggle Recording.`);
    const result = await this.remote.toggleRecord();
    if (result.type === 'error') {
      logger.debug(`[DISPATCH] ToggleRecord failed: ${result.errorMessage}`);
      this.session.markDisconnected(`ToggleRecord failed: ${result.errorMessage}`);
      return { type: 'dropped', reason: 'rpc-error' };
    }
    return { type: 'recording-toggled' };
  }

  async toggleApplication(source: string): Promise<DispatchOutcome> {
    const now = (this.options.now ?? Date.now)();
    // Claimed before the first await
    if (!this.session.tryBeginToggle(now, this.options.toggleCooldownMs)) {
      logger.debug(`[DISPATCH] Dropping application toggle from ${source}: cooldown`);
      return { type: 'dropped', reason: 'cooldown' };
    }

    const running = await this.processes.findRunning();
    if (running) {
      return this.closeApplication(running.pid);
    }
    return this.launchApplication();
  }

  private async isRecording(): Promise<boolean> {
    if (!this.session.connected) {
      return false;
    }
    const result = await this.remote.getRecordStatus();
    if (result.type === 'error') {
      this.session.markDisconnected(`GetRecordStatus failed: ${result.errorMessage}`);
      return false;
    }
    return result.value.active;
  }

  private async closeApplication(pid: number): Promise<DispatchOutcome> {
    if (await this.isRecording()) {
      logger.warn('Cannot close OBS: Recording is active.');
      return { type: 'close-refused-recording', pid };
    }

    logger.info(`Closing OBS (PID ${pid}) gracefully...`);
    const result = this.processes.terminate(pid);

    switch (result.type) {
      case 'signalled':
        this.session.markDisconnected('application closing');
        return { type: 'closing', pid };
      case 'already-exited':
        logger.debug(`[DISPATCH] PID ${pid} exited before it was signalled`);
        this.session.markDisconnected('application exited');
        return { type: 'already-closed', pid };
      case 'error':
        logger.error(`Failed to close OBS (PID ${pid}): ${result.errorMessage}`);
        return { type: 'failed', errorMessage: result.errorMessage };
    }
  }

  private async launchApplication(): Promise<DispatchOutcome> {
    logger.info('Launching OBS...');
    const result = await this.processes.launch();

    switch (result.type) {
      case 'launched':
        logger.debug(`[DISPATCH] Launched PID ${result.pid}`);
        this.session.markDisconnected('application launched');
        return { type: 'launched' };
      case 'not-found':
        logger.error(`Error: Command '${result.executable}' not found.`);
        return { type: 'failed', errorMessage: `Command '${result.executable}' not found` };
      case 'error':
        logger.error(`Failed to launch OBS: ${result.errorMessage}`);
        return { type: 'failed', errorMessage: result.errorMessage };
    }
  }
}
