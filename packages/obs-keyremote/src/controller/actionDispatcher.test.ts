import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('@/ui/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { FakeProcessManager, FakeRemoteControl } from '@/testing/fakes';
import { logger } from '@/ui/logger';
import { ActionDispatcher } from './actionDispatcher';
import { ControllerSession } from './session';

describe('ActionDispatcher', () => {
  let session: ControllerSession;
  let remote: FakeRemoteControl;
  let processes: FakeProcessManager;
  let now: number;
  let dispatcher: ActionDispatcher;

  beforeEach(() => {
    vi.clearAllMocks();
    session = new ControllerSession();
    remote = new FakeRemoteControl();
    processes = new FakeProcessManager();
    now = 10_000;
    dispatcher = new ActionDispatcher(session, remote, processes, {
      toggleCooldownMs: 2_000,
      now: () => now,
    });
  });

  describe('toggleRecording', () => {
    it('drops the action while disconnected', async () => {
      await expect(dispatcher.toggleRecording('Keypad')).resolves.toEqual({ type: 'dropped', reason: 'disconnected' });
      expect(remote.toggleCalls).toBe(0);
    });

    it('toggles recording when connected', async () => {
      session.markConnected();

      await expect(dispatcher.toggleRecording('Keypad')).resolves.toEqual({ type: 'recording-toggled' });
      expect(remote.toggleCalls).toBe(1);
      expect(logger.info).toHaveBeenCalledWith('[Keypad] Toggle Recording.');
    });

    it('marks the session disconnected when the call fails', async () => {
      session.markConnected();
      remote.failNextCall = true;

      await expect(dispatcher.toggleRecording('Keypad')).resolves.toEqual({ type: 'dropped', reason: 'rpc-error' });
      expect(session.connected).toBe(false);
    });
  });

  describe('toggleApplication', () => {
    it('launches the application when it is not running', async () => {
      session.markConnected();

      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({ type: 'launched' });
      expect(processes.launches).toBe(1);
      expect(session.connected).toBe(false);
      expect(logger.info).toHaveBeenCalledWith('Launching OBS...');
    });

    it('collapses toggles inside the cooldown and accepts one after it', async () => {
      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({ type: 'launched' });

      now = 11_999;
      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({ type: 'dropped', reason: 'cooldown' });

      now = 12_000;
      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({ type: 'launched' });
      expect(processes.launches).toBe(2);
      expect(session.lastToggleTime).toBe(12_000);
    });

    it('lets only one of two concurrent toggles through', async () => {
      const outcomes = await Promise.all([
        dispatcher.toggleApplication('Keypad'),
        dispatcher.toggleApplication('Pedal'),
      ]);

      expect(outcomes).toEqual([{ type: 'launched' }, { type: 'dropped', reason: 'cooldown' }]);
      expect(processes.findCalls).toBe(1);
    });

    it('refuses to close the application while recording', async () => {
      session.markConnected();
      remote.recording = true;
      processes.running = { pid: 777, name: 'obs', command: '/usr/bin/obs' };

      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({ type: 'close-refused-recording', pid: 777 });
      expect(processes.terminated).toEqual([]);
      expect(session.connected).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith('Cannot close OBS: Recording is active.');
    });

    it('closes the application when it is not recording', async () => {
      session.markConnected();
      processes.running = { pid: 777, name: 'obs', command: '/usr/bin/obs' };

      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({ type: 'closing', pid: 777 });
      expect(remote.statusCalls).toBe(1);
      expect(processes.terminated).toEqual([777]);
      expect(session.connected).toBe(false);
      expect(logger.info).toHaveBeenCalledWith('Closing OBS (PID 777) gracefully...');
    });

    it('does not query recording status while disconnected', async () => {
      processes.running = { pid: 777, name: 'obs', command: '/usr/bin/obs' };

      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({ type: 'closing', pid: 777 });
      expect(remote.statusCalls).toBe(0);
    });

    it('treats a failed status query as not recording', async () => {
      session.markConnected();
      remote.recording = true;
      remote.failNextCall = true;
      processes.running = { pid: 777, name: 'obs', command: '/usr/bin/obs' };

      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({ type: 'closing', pid: 777 });
      expect(processes.terminated).toEqual([777]);
      expect(session.connected).toBe(false);
    });

    it('treats a process that vanished before the signal as closed', async () => {
      processes.running = { pid: 777, name: 'obs', command: '/usr/bin/obs' };
      processes.terminateResult = { type: 'already-exited' };

      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({ type: 'already-closed', pid: 777 });
    });

    it('keeps the connection when the close signal cannot be sent', async () => {
      session.markConnected();
      processes.running = { pid: 777, name: 'obs', command: '/usr/bin/obs' };
      processes.terminateResult = { type: 'error', errorMessage: 'kill EPERM' };

      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({ type: 'failed', errorMessage: 'kill EPERM' });
      expect(processes.terminated).toEqual([777]);
      expect(logger.error).toHaveBeenCalledWith('Failed to close OBS (PID 777): kill EPERM');
      expect(session.connected).toBe(true);
    });

    it('reports a missing executable without changing the connection', async () => {
      session.markConnected();
      processes.launchResult = { type: 'not-found', executable: 'obs' };

      await expect(dispatcher.toggleApplication('Keypad')).resolves.toEqual({
        type: 'failed',
        errorMessage: "Command 'obs' not found",
      });
      expect(logger.error).toHaveBeenCalledWith("Error: Command 'obs' not found.");
      expect(session.connected).toBe(true);
    });
  });
});
