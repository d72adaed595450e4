import type { RemoteControlClient } from '@/obs/remoteControl';
import { logger } from '@/ui/logger';
import { startNonOverlappingInterval } from '@/utils/time';
import type { ControllerSession } from './session';

/**
 * Keeps the control channel usable: whenever the session is disconnected,
 * tries to connect again on every tick. Failures wait for the next tick.
 */
export class ReconnectSupervisor {
  private stopInterval: (() => void) | null = null;

  constructor(
    private readonly session: ControllerSession,
    private readonly remote: RemoteControlClient,
    private readonly options: { reconnectDelayMs: number },
  ) {
    remote.onConnectionClosed((reason) => {
      session.markDisconnected(`connection closed: ${reason}`);
    });
  }

  start(): void {
    if (this.stopInterval) {
      return;
    }
    this.stopInterval = startNonOverlappingInterval(
      async () => {
        await this.attempt();
      },
      this.options.reconnectDelayMs,
      (error) => logger.debug('[RECONNECT] Attempt failed unexpectedly:', error),
    );
  }

  stop(): void {
    this.stopInterval?.();
    this.stopInterval = null;
  }

  /** One supervision step. Returns whether the session is connected afterwards. */
  async attempt(): Promise<boolean> {
    if (this.session.connected) {
      return true;
    }

    const result = await this.remote.connect();
    if (result.type === 'error') {
      logger.debug(`[RECONNECT] Connect failed: ${result.errorMessage}`);
      return false;
    }

    this.session.markConnected();
    logger.info('Connected to OBS WebSocket.');
    return true;
  }
}
