/**
 * Application process management
 *
 * Finds the controlled application among running processes, closes it
 * with SIGINT and launches it detached from this process.
 */

import { readFile } from 'node:fs/promises';
import psList from 'ps-list';
import spawn from 'cross-spawn';

import { logger } from '@/ui/logger';

export type ApplicationProcessInfo = { pid: number; name: string; command: string };

export type TerminateResult =
  | { type: 'signalled' }
  | { type: 'already-exited' }
  | { type: 'error'; errorMessage: string };

export type LaunchResult =
  | { type: 'launched'; pid: number | undefined }
  | { type: 'not-found'; executable: string }
  | { type: 'error'; errorMessage: string };

export interface ApplicationProcessManager {
  findRunning(): Promise<ApplicationProcessInfo | null>;
  terminate(pid: number): TerminateResult;
  launch(): Promise<LaunchResult>;
}

const INTERPRETER_NAMES = ['node', 'python'];

/**
 * Classify a process as the controlled application.
 * Returns null when the process is unrelated.
 */
export function classifyApplicationProcess(
  proc: { pid: number; name?: string; cmd?: string },
  params: { processName: string; selfPid: number; selfName: string },
): ApplicationProcessInfo | null {
  const name = (proc.name || '').toLowerCase();
  if (!name || proc.pid === params.selfPid) {
    return null;
  }

  // Interpreters and this program never match, whatever their arguments
  if (INTERPRETER_NAMES.some(interpreter => name.includes(interpreter)) || name.includes(params.selfName)) {
    return null;
  }
  if (!name.startsWith(params.processName)) {
    return null;
  }
  const suffix = name.slice(params.processName.length);
  if (suffix !== '' && /^[a-z]/.test(suffix)) {
    return null;
  }

  return { pid: proc.pid, name: proc.name || name, command: proc.cmd || name };
}

const SANITIZED_VARIABLES = new Set(['NODE_OPTIONS', 'NODE_PATH', 'NODE_EXTRA_CA_CERTS', 'NODE_ENV', 'PYTHONPATH', 'PYTHONHOME']);
const SANITIZED_PREFIXES = ['TSX_', 'TS_NODE_', 'npm_'];

/**
 * Inherited environment without the controller's own runtime settings, so
 * the launched native application does not pick them up.
 */
export function sanitizeLaunchEnvironment(env: NodeJS.ProcessEnv): Record<string, string> {
  const clean: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) {
      continue;
    }
    if (SANITIZED_VARIABLES.has(key) || SANITIZED_PREFIXES.some(prefix => key.startsWith(prefix))) {
      continue;
    }
    clean[key] = value;
  }
  return clean;
}

/**
 * Reads the state letter from /proc/<pid>/stat. Null when it is not
 * available (process gone, or not a Linux host).
 */
export async function readProcessState(pid: number, procDir = '/proc'): Promise<string | null> {
  try {
    const stat = await readFile(`${procDir}/${pid}/stat`, 'utf-8');
    // The command name is parenthesised and may itself contain spaces or parentheses.
    const afterName = stat.slice(stat.lastIndexOf(')') + 1).trim();
    return afterName.charAt(0) || null;
  } catch {
    return null;
  }
}

export class LocalApplicationProcessManager implements ApplicationProcessManager {
  constructor(
    private readonly options: {
      processName: string;
      executable: string;
      selfName: string;
      env?: NodeJS.ProcessEnv;
      procDir?: string;
    },
  ) {}

  async findRunning(): Promise<ApplicationProcessInfo | null> {
    let processes: Awaited<ReturnType<typeof psList>>;
    try {
      processes = await psList();
    } catch (error) {
      logger.debug('[PROCESS] Failed to list processes:', error);
      return null;
    }

    for (const proc of processes) {
      const classified = classifyApplicationProcess(proc, {
        processName: this.options.processName,
        selfPid: process.pid,
        selfName: this.options.selfName,
      });
      if (!classified) {
        continue;
      }

      const state = await readProcessState(classified.pid, this.options.procDir);
      if (state === 'Z' || state === 'X') {
        logger.debug(`[PROCESS] Skipping defunct process PID ${classified.pid}`);
        continue;
      }
      return classified;
    }
    return null;
  }

  terminate(pid: number): TerminateResult {
    try {
      process.kill(pid, 'SIGINT');
      return { type: 'signalled' };
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ESRCH') {
        return { type: 'already-exited' };
      }
      return { type: 'error', errorMessage: err.message };
    }
  }

  launch(): Promise<LaunchResult> {
    const executable = this.options.executable;
    return new Promise((resolve) => {
      let child: ReturnType<typeof spawn>;
      try {
        child = spawn(executable, [], {
          detached: true,
          stdio: 'ignore',
          env: sanitizeLaunchEnvironment(this.options.env ?? process.env),
        });
      } catch (error) {
        resolve({ type: 'error', errorMessage: error instanceof Error ? error.message : String(error) });
        return;
      }

      child.once('spawn', () => {
        child.unref();
        resolve({ type: 'launched', pid: child.pid });
      });
      child.once('error', (error: Error) => {
        if ('code' in error && error.code === 'ENOENT') {
          resolve({ type: 'not-found', executable });
          return;
        }
        resolve({ type: 'error', errorMessage: error.message });
      });
    });
  }
}
