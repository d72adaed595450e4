/**
 * Remote control client for the OBS WebSocket (v5 protocol)
 *
 * Owns a single logical connection. Every operation reports its outcome as
 * a result value; transport exceptions never escape this module.
 */

import OBSWebSocket from 'obs-websocket-js';

import { logger } from '@/ui/logger';
import { withTimeout } from '@/utils/time';

export type RemoteControlResult<T> =
  | { type: 'success'; value: T }
  | { type: 'error'; errorMessage: string };

export interface RecordStatus {
  active: boolean;
}

export interface RemoteControlClient {
  connect(): Promise<RemoteControlResult<void>>;
  toggleRecord(): Promise<RemoteControlResult<void>>;
  getRecordStatus(): Promise<RemoteControlResult<RecordStatus>>;
  disconnect(): Promise<void>;
  /** Called when the current connection drops on its own */
  onConnectionClosed(listener: (reason: string) => void): void;
}

export interface ObsConnectionOptions {
  host: string;
  port: number;
  password: string;
  connectTimeoutMs: number;
}

function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ObsRemoteControlClient implements RemoteControlClient {
  private socket: OBSWebSocket | null = null;
  private readonly closedListeners: Array<(reason: string) => void> = [];

  constructor(private readonly options: ObsConnectionOptions) {}

  get url(): string {
    return `ws://${this.options.host}:${this.options.port}`;
  }

  async connect(): Promise<RemoteControlResult<void>> {
    await this.discardSocket();

    const socket = new OBSWebSocket();
    this.socket = socket;
    socket.on('ConnectionClosed', (error) => {
      if (this.socket !== socket) {
        return;
      }
      this.socket = null;
      const reason = error.message || `code ${error.code}`;
      logger.debug(`[OBS] Connection closed: ${reason}`);
      for (const listener of this.closedListeners) {
        listener(reason);
      }
    });

    const password = this.options.password === '' ? undefined : this.options.password;
    const result = await withTimeout<RemoteControlResult<void>>(
      socket.connect(this.url, password).then(
        (): RemoteControlResult<void> => ({ type: 'success', value: undefined }),
        (error: unknown): RemoteControlResult<void> => ({ type: 'error', errorMessage: errorMessageOf(error) }),
      ),
      this.options.connectTimeoutMs,
      () => ({ type: 'error', errorMessage: `Timed out connecting to ${this.url}` }),
    );

    if (result.type === 'error' && this.socket === socket) {
      await this.discardSocket();
    }
    return result;
  }

  async toggleRecord(): Promise<RemoteControlResult<void>> {
    const socket = this.identifiedSocket();
    if (!socket) {
      return { type: 'error', errorMessage: 'Not connected to OBS' };
    }
    try {
      await socket.call('ToggleRecord');
      return { type: 'success', value: undefined };
    } catch (error) {
      return { type: 'error', errorMessage: errorMessageOf(error) };
    }
  }

  async getRecordStatus(): Promise<RemoteControlResult<RecordStatus>> {
    const socket = this.identifiedSocket();
    if (!socket) {
      return { type: 'error', errorMessage: 'Not connected to OBS' };
    }
    try {
      const response = await socket.call('GetRecordStatus');
      return { type: 'success', value: { active: response.outputActive } };
    } catch (error) {
      return { type: 'error', errorMessage: errorMessageOf(error) };
    }
  }

  async disconnect(): Promise<void> {
    await this.discardSocket();
  }

  onConnectionClosed(listener: (reason: string) => void): void {
    this.closedListeners.push(listener);
  }

  private identifiedSocket(): OBSWebSocket | null {
    return this.socket?.identified ? this.socket : null;
  }

  private async discardSocket(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;
    try {
      await socket.disconnect();
    } catch (error) {
      logger.debug('[OBS] Failed to close previous socket:', error);
    }
  }
}
