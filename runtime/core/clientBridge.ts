// runtime/core/clientBridge.ts

import { randomUUID } from 'node:crypto';
import type { ClientToolCall, ClientToolResult } from '../../core/types.ts';
import { DEFAULTS } from '../../core/constants.ts';
import { createLogger } from '../shared/logger.ts';
import { CancelledError, ToolTimeoutError } from './errors.ts';
import type { EventSink } from './observer.ts';

const log = createLogger('client-bridge');

export interface PendingToolCall {
  id: string;
  tools: ClientToolCall[];
  createdAt: number;
  deadline?: number;
}

export interface EmitOptions {
  sink: EventSink;
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface PendingEntry {
  call: PendingToolCall;
  settle(outcome: { ok: true; results: ClientToolResult[] } | { ok: false; error: Error }): boolean;
}

/**
 * Hands tool calls the engine cannot execute to the connected client and suspends
 * the caller until the client posts results.
 *
 * Each pending call settles exactly once: by `resolve`, by its deadline, or by cancellation.
 */
export class ClientBridge {
  private readonly pending = new Map<string, PendingEntry>();

  constructor(private readonly defaultTimeoutMs: number = DEFAULTS.clientToolTimeoutMs) {}

  emitAndAwait(tools: ClientToolCall[], options: EmitOptions): Promise<ClientToolResult[]> {
    const id = randomUUID();
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const createdAt = Date.now();
    const call: PendingToolCall = { id, tools, createdAt };
    if (timeoutMs > 0) call.deadline = createdAt + timeoutMs;

    return new Promise<ClientToolResult[]>((resolve, reject) => {
      const { signal } = options;
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }

      let timer: ReturnType<typeof setTimeout> | undefined;
      let settled = false;

      const onAbort = () => {
        entry.settle({ ok: false, error: new CancelledError() });
      };

      const entry: PendingEntry = {
        call,
        settle: (outcome) => {
          if (settled) return false;
          settled = true;
          if (timer !== undefined) clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
          this.pending.delete(id);
          if (outcome.ok) resolve(outcome.results);
          else reject(outcome.error);
          return true;
        },
      };

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          log.warn('Client tool call timed out', { callId: id, timeoutMs });
          entry.settle({ ok: false, error: new ToolTimeoutError(id, timeoutMs) });
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(id, entry);
      log.debug('Awaiting client tool results', { callId: id, tools: tools.map((t) => t.name) });
      options.sink.emit({ type: 'tool_call', callId: id, tools });
    });
  }

  /**
   * Deliver client results. Returns false for unknown or already settled calls.
   */
  resolve(callId: string, results: ClientToolResult[]): boolean {
    const entry = this.pending.get(callId);
    if (!entry) {
      log.warn('Results for unknown client tool call', { callId });
      return false;
    }
    return entry.settle({ ok: true, results });
  }

  get pendingCalls(): PendingToolCall[] {
    return [...this.pending.values()].map((entry) => entry.call);
  }
}
