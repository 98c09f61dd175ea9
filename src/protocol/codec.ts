/**
 * Line codec for the Unison fsmonitor protocol.
 *
 * A line is a verb followed by space separated arguments. Arguments are
 * percent-encoded: every byte of the UTF-8 form outside `A-Za-z0-9_.-~/` is
 * written as `%XX`.
 */

import { z, type ZodIssue } from 'zod';
import { ProtocolError } from '../utils/errors.js';

export type HostCommand =
  | { verb: 'VERSION'; version: string }
  | { verb: 'DEBUG' }
  | { verb: 'START'; hash: string; fspath: string; path: string }
  | { verb: 'DIR'; path: string }
  | { verb: 'LINK'; path: string }
  | { verb: 'DONE' }
  | { verb: 'WAIT'; hash: string; timeoutMs?: number }
  | { verb: 'CHANGES'; hash: string }
  | { verb: 'RESET'; hash: string };

export type HostVerb = HostCommand['verb'];

export type BridgeVerb = 'VERSION' | 'OK' | 'CHANGES' | 'NOCHANGES' | 'RECURSIVE' | 'DONE' | 'ERROR';

export function quote(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%2F/g, '/');
}

/**
 * Decodes every `%XX` run as UTF-8; anything that is not a valid escape is
 * kept as written.
 */
export function unquote(value: string): string {
  return value.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) => Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8'));
}

export function formatLine(verb: BridgeVerb, args: readonly string[] = []): string {
  return [verb, ...args.map(quote)].join(' ');
}

function argList(min: number, max: number) {
  return z
    .array(z.string())
    .min(min, `expected at least ${min} argument(s)`)
    .max(max, `expected at most ${max} argument(s)`);
}

function hashedArgList(min: number, max: number) {
  return argList(min, max).refine((args) => args.length === 0 || args[0] !== '', {
    message: 'replica hash must not be empty',
    path: [0]
  });
}

const commandSchemas = {
  VERSION: argList(1, 1).transform((args): HostCommand => ({ verb: 'VERSION', version: args[0] })),
  DEBUG: argList(0, 0).transform((): HostCommand => ({ verb: 'DEBUG' })),
  START: hashedArgList(2, 3).transform(
    (args): HostCommand => ({ verb: 'START', hash: args[0], fspath: args[1], path: args[2] ?? '' })
  ),
  DIR: argList(0, 1).transform((args): HostCommand => ({ verb: 'DIR', path: args[0] ?? '' })),
  LINK: argList(1, 1).transform((args): HostCommand => ({ verb: 'LINK', path: args[0] })),
  DONE: argList(0, 0).transform((): HostCommand => ({ verb: 'DONE' })),
  WAIT: hashedArgList(1, 2)
    .refine((args) => args.length < 2 || /^\d+$/.test(args[1]), {
      message: 'timeout must be a non-negative integer of milliseconds',
      path: [1]
    })
    .transform(
      (args): HostCommand =>
        args.length < 2 ? { verb: 'WAIT', hash: args[0] } : { verb: 'WAIT', hash: args[0], timeoutMs: Number(args[1]) }
    ),
  CHANGES: hashedArgList(1, 1).transform((args): HostCommand => ({ verb: 'CHANGES', hash: args[0] })),
  RESET: hashedArgList(1, 1).transform((args): HostCommand => ({ verb: 'RESET', hash: args[0] }))
} satisfies Record<HostVerb, z.ZodType<HostCommand, z.ZodTypeDef, string[]>>;

function isHostVerb(verb: string): verb is HostVerb {
  return Object.prototype.hasOwnProperty.call(commandSchemas, verb);
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => (issue.path.length > 0 ? `arg ${issue.path.join('.')}: ${issue.message}` : issue.message)).join(', ');
}

/**
 * Parse one command line. Returns null for a blank line.
 */
export function parseCommand(line: string): HostCommand | null {
  const trimmed = line.replace(/\r$/, '').trim();
  if (trimmed === '') {
    return null;
  }

  const [verb, ...rawArgs] = trimmed.split(' ');
  if (!isHostVerb(verb)) {
    throw new ProtocolError('UNEXPECTED_COMMAND', `unexpected command: ${verb}`);
  }

  const parsed = commandSchemas[verb].safeParse(rawArgs.map(unquote));
  if (!parsed.success) {
    throw new ProtocolError('MALFORMED_COMMAND', `malformed ${verb} command: ${formatIssues(parsed.error.issues)}`);
  }

  return parsed.data;
}
