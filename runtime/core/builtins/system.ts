// runtime/core/builtins/system.ts

import { setTimeout as sleep } from 'node:timers/promises';
import type { BuiltinTool } from '../toolsRuntime.ts';
import { transient } from '../toolsRuntime.ts';
import { createLogger } from '../../shared/logger.ts';
import { CancelledError } from '../errors.ts';
import { optionalNumber, optionalString, unquote } from './args.ts';

const log = createLogger('builtin');

const SET_CONTEXT_RESERVED = new Set(['path', 'value']);

export const timer: BuiltinTool = {
  name: 'timer',
  async execute({ args, signal }) {
    const ms = optionalNumber(args, 'ms');
    const seconds = optionalNumber(args, 'seconds');
    const durationMs = Math.max(0, ms ?? (seconds !== undefined ? seconds * 1000 : 1000));

    try {
      await sleep(durationMs, undefined, { signal });
    } catch (err) {
      if (signal.aborted) throw new CancelledError();
      throw err;
    }
    return { status: 'finished', duration_ms: durationMs };
  },
};

export const notify: BuiltinTool = {
  name: 'notify',
  async execute({ args, context, node }) {
    const status = optionalString(args, 'status');
    if (status !== undefined) {
      context.set('reply.status', status, node);
    }
    const message = optionalString(args, 'message') ?? '';
    if (message) {
      log.info('Notification', { node, message });
    }
    return { status: 'sent', content: message };
  },
};

function contextPath(text: string): string {
  let path = unquote(text);
  if (path.startsWith('$')) path = path.slice(1);
  return path.startsWith('ctx.') ? path.slice(4) : path;
}

/**
 * `set_context(path=..., value=...)` or `set_context(key1=..., key2=...)`.
 * The path is taken from the argument text, not evaluated.
 */
export const setContext: BuiltinTool = {
  name: 'set_context',
  async execute({ args, raw, context, node }) {
    if ('path' in args && 'value' in args) {
      const path = contextPath(raw?.path ?? optionalString(args, 'path') ?? '');
      context.set(path, args.value, node);
      return transient();
    }
    for (const [key, value] of Object.entries(args)) {
      if (SET_CONTEXT_RESERVED.has(key)) continue;
      context.set(key, value, node);
    }
    return transient();
  },
};

export const returnValue: BuiltinTool = {
  name: 'return',
  async execute({ args }) {
    return args.value ?? null;
  },
};
