// runtime/core/simulatedModel.ts

import type { ChatCallOptions, ChatMessage, ChatModel, ChatRequest, ChatResponse } from './models.ts';

// -----------------------------
// Simulation helpers (deterministic, seed-based, no network)
// -----------------------------

export function strHash32(input: string): number {
  // Simple deterministic 32-bit hash
  let h = 2166136261;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

export function mulberry32(seed: number): () => number {
  // Deterministic PRNG
  return function () {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function lastUserText(messages: ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message.role === 'user') return message.content;
  }
  return '';
}

// Split into word-sized deltas that concatenate back to `text`.
function toDeltas(text: string): string[] {
  return text.match(/\S+\s*|\s+/g) ?? [];
}

export interface SimulatedChatModelOptions {
  seed?: number;
}

/**
 * Stand-in for the real model in sim mode. Replies depend only on seed, agent and
 * the last user message; it never asks for tools.
 */
export class SimulatedChatModel implements ChatModel {
  private readonly seed: number;
  private conversations = 0;

  constructor(options: SimulatedChatModelOptions = {}) {
    this.seed = options.seed ?? 0;
  }

  async chat(request: ChatRequest, options: ChatCallOptions = {}): Promise<ChatResponse> {
    const message = lastUserText(request.messages);
    const sig = strHash32(`${this.seed}::${request.agent}::${message}`);
    const rand = mulberry32(sig);
    const pick = <T,>(arr: readonly T[]): T => arr[Math.floor(rand() * arr.length)];

    const content =
      request.responseFormat === 'json'
        ? JSON.stringify({
            simulated: true,
            agent: request.agent,
            decision: pick(['A', 'B', 'C', 'D']),
            signature: `sim-${this.seed}-${request.agent}-${sig}`,
          })
        : `SIMULATED_OUTPUT(${request.agent}) seed=${this.seed} sig=${sig}`;

    const deltas = toDeltas(content);
    if (options.onToken) {
      for (const delta of deltas) options.onToken(delta);
    }

    let chatId = request.chatId ?? null;
    if (request.remember && chatId === null) {
      this.conversations += 1;
      chatId = `sim-chat-${this.conversations}`;
    }

    return {
      kind: 'final',
      content,
      chatId,
      tokens: deltas.length,
      model: 'sim',
      finishReason: 'STOP',
    };
  }
}
