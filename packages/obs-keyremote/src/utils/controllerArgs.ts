import { z } from 'zod';

import type { ControllerOptions } from '@/controller/types';

export const CONTROLLER_USAGE = 'Usage: obs-keyremote --code <key code> [--host <host>] [--port <port>] [--password <password>]';

const FLAGS = ['host', 'port', 'password', 'code'] as const;
type Flag = (typeof FLAGS)[number];

const ControllerArgsSchema = z.object({
  host: z.string().min(1, 'must not be empty').default('localhost'),
  port: z
    .string()
    .regex(/^\d+$/, 'must be an integer')
    .default('4455')
    .transform(Number)
    .pipe(z.number().min(1, 'must be between 1 and 65535').max(65535, 'must be between 1 and 65535')),
  password: z.string().default(''),
  code: z
    .string({ required_error: 'is required' })
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform(Number),
});

export type ParseControllerArgsResult =
  | { type: 'success'; options: ControllerOptions }
  | { type: 'error'; errorMessage: string };

function isFlag(name: string): name is Flag {
  return FLAGS.some(flag => flag === name);
}

/**
 * Parses `--flag value` and `--flag=value` pairs.
 */
export function parseControllerArgs(args: string[]): ParseControllerArgsResult {
  const raw: Partial<Record<Flag, string>> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      return { type: 'error', errorMessage: `Unexpected argument: ${arg}` };
    }

    const equalsIndex = arg.indexOf('=');
    const name = equalsIndex === -1 ? arg.slice(2) : arg.slice(2, equalsIndex);
    if (!isFlag(name)) {
      return { type: 'error', errorMessage: `Unknown option: --${name}` };
    }

    if (equalsIndex !== -1) {
      raw[name] = arg.slice(equalsIndex + 1);
      continue;
    }
    const value = args[i + 1];
    if (value === undefined) {
      return { type: 'error', errorMessage: `Option --${name} requires a value` };
    }
    raw[name] = value;
    i++;
  }

  const parsed = ControllerArgsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { type: 'error', errorMessage: `--${issue.path.join('.')} ${issue.message}` };
  }

  return {
    type: 'success',
    options: {
      host: parsed.data.host,
      port: parsed.data.port,
      password: parsed.data.password,
      triggerCode: parsed.data.code,
    },
  };
}
