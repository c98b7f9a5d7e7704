// runtime/core/builtins/http.ts

import type { BuiltinCall, BuiltinTool, HttpExecutionResult } from '../toolsRuntime.ts';
import { executeHttpTool } from '../toolsRuntime.ts';
import { createLogger } from '../../shared/logger.ts';
import { optionalString, optionalStringMap, requireString } from './args.ts';

const log = createLogger('builtin');

async function request(call: BuiltinCall): Promise<{ url: string; method: string; result: HttpExecutionResult }> {
  const { tool, args, signal, services } = call;
  const url = requireString(args, tool, 'url');
  const method = (optionalString(args, 'method') ?? 'GET').toUpperCase();
  const headers = optionalStringMap(args, 'headers');
  const bodyless = method === 'GET' || method === 'HEAD';

  const result = await executeHttpTool(
    { url, method, ...(headers ? { headers } : {}) },
    {
      input: bodyless ? args.query ?? null : args.body ?? null,
      signal,
      fetch: services.fetch,
    },
  );
  log.debug('HTTP request finished', { tool, method, url, status: result.status });
  return { url, method, result };
}

export const fetchTool: BuiltinTool = {
  name: 'fetch',
  required: ['url'],
  async execute(call) {
    const { result } = await request(call);
    return { status: result.status, ok: result.ok, data: result.data };
  },
};

export const fetchUrl: BuiltinTool = {
  name: 'fetch_url',
  required: ['url'],
  async execute(call) {
    const { url, method, result } = await request(call);
    return { status: result.status, method, url, content: result.data, ok: result.ok };
  },
};
