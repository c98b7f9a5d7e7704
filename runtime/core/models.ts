// runtime/core/models.ts

import { randomUUID } from 'node:crypto';
import {
  GoogleGenAI,
  type Content,
  type FunctionCall,
  type FunctionDeclaration,
  type GenerateContentConfig,
  type Part,
} from '@google/genai';
import { DEFAULTS } from '../../core/constants.ts';
import type { ToolDefinition, ValueObject } from '../../core/types.ts';
import { createLogger } from '../shared/logger.ts';
import { isValueObject, toValue } from './value.ts';

const log = createLogger('model');

// -----------------------------
// Collaborator contract
// -----------------------------

export interface ModelToolCall {
  id: string;
  name: string;
  arguments: ValueObject;
}

export type ChatMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ModelToolCall[] }
  | { role: 'tool'; toolCallId: string; name: string; content: string };

export interface ChatRequest {
  agent: string;
  model: string;
  systemPrompt?: string;
  temperature: number;

  // Messages of this turn; earlier turns come from the conversation behind `chatId`.
  messages: ChatMessage[];
  tools: ToolDefinition[];

  // Continue this conversation.
  chatId?: string;

  // Keep the turn in conversation history (a new chat id is assigned when none is given).
  remember: boolean;
  responseFormat?: 'text' | 'json';
}

interface ChatResponseBase {
  content: string;
  chatId: string | null;
  tokens: number;
  model: string;
}

export type ChatResponse =
  | (ChatResponseBase & { kind: 'final'; finishReason: string })
  | (ChatResponseBase & { kind: 'tool_calls'; calls: ModelToolCall[] });

export interface ChatCallOptions {
  signal?: AbortSignal;

  // Receives visible text deltas while the model streams.
  onToken?: (delta: string) => void;
}

export interface ChatModel {
  chat(request: ChatRequest, options?: ChatCallOptions): Promise<ChatResponse>;
}

// -----------------------------
// Gemini
// -----------------------------

function toContent(message: ChatMessage): Content {
  switch (message.role) {
    case 'user':
      return { role: 'user', parts: [{ text: message.content }] };
    case 'assistant': {
      const parts: Part[] = message.content ? [{ text: message.content }] : [];
      for (const call of message.toolCalls ?? []) {
        parts.push({ functionCall: { id: call.id, name: call.name, args: call.arguments } });
      }
      return { role: 'model', parts };
    }
    case 'tool':
      return {
        role: 'user',
        parts: [{ functionResponse: { id: message.toolCallId, name: message.name, response: { result: message.content } } }],
      };
  }
}

function toDeclaration(tool: ToolDefinition): FunctionDeclaration {
  const declaration: FunctionDeclaration = { name: tool.function.name };
  if (tool.function.description) declaration.description = tool.function.description;
  if (tool.function.parameters) declaration.parametersJsonSchema = tool.function.parameters;
  return declaration;
}

function fromFunctionCall(call: FunctionCall): ModelToolCall {
  const args = toValue(call.args ?? {});
  return {
    id: call.id ?? randomUUID(),
    name: call.name ?? '',
    arguments: isValueObject(args) ? args : {},
  };
}

/**
 * Remembered conversations by chat id, least recently used evicted first.
 */
export class ConversationStore<T> {
  private readonly entries = new Map<string, T[]>();

  constructor(readonly capacity: number = DEFAULTS.maxConversations) {}

  get(chatId: string): T[] | undefined {
    const history = this.entries.get(chatId);
    if (history !== undefined) {
      this.entries.delete(chatId);
      this.entries.set(chatId, history);
    }
    return history;
  }

  set(chatId: string, history: T[]): void {
    this.entries.delete(chatId);
    this.entries.set(chatId, history);
    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.capacity) break;
      this.entries.delete(oldest);
      log.debug('Conversation evicted', { chatId: oldest });
    }
  }

  get size(): number {
    return this.entries.size;
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }
}

export interface GeminiChatModelOptions {
  apiKey?: string;
  client?: GoogleGenAI;
  maxConversations?: number;
}

/**
 * ChatModel over @google/genai. Conversations are kept in memory per chat id.
 */
export class GeminiChatModel implements ChatModel {
  private readonly ai: GoogleGenAI;
  private readonly histories: ConversationStore<Content>;

  constructor(options: GeminiChatModelOptions) {
    this.ai = options.client ?? new GoogleGenAI({ apiKey: options.apiKey });
    this.histories = new ConversationStore(options.maxConversations);
  }

  async chat(request: ChatRequest, options: ChatCallOptions = {}): Promise<ChatResponse> {
    const prior = request.chatId ? this.histories.get(request.chatId) ?? [] : [];
    const turn = request.messages.map(toContent);
    const contents = [...prior, ...turn];

    const config: GenerateContentConfig = { temperature: request.temperature };
    if (request.systemPrompt) config.systemInstruction = request.systemPrompt;
    if (request.tools.length > 0) config.tools = [{ functionDeclarations: request.tools.map(toDeclaration) }];
    if (request.responseFormat === 'json' && request.tools.length === 0) config.responseMimeType = 'application/json';
    if (options.signal) config.abortSignal = options.signal;

    let content = '';
    let tokens = 0;
    let finishReason = 'STOP';
    const calls: ModelToolCall[] = [];

    if (options.onToken) {
      const stream = await this.ai.models.generateContentStream({ model: request.model, contents, config });
      for await (const chunk of stream) {
        const text = chunk.text;
        if (text) {
          content += text;
          options.onToken(text);
        }
        for (const call of chunk.functionCalls ?? []) calls.push(fromFunctionCall(call));
        tokens = chunk.usageMetadata?.totalTokenCount ?? tokens;
        const reason = chunk.candidates?.[0]?.finishReason;
        if (reason) finishReason = String(reason);
      }
    } else {
      const response = await this.ai.models.generateContent({ model: request.model, contents, config });
      content = response.text ?? '';
      for (const call of response.functionCalls ?? []) calls.push(fromFunctionCall(call));
      tokens = response.usageMetadata?.totalTokenCount ?? 0;
      const reason = response.candidates?.[0]?.finishReason;
      if (reason) finishReason = String(reason);
    }

    let chatId: string | null = request.chatId ?? null;
    if (request.remember) {
      chatId = chatId ?? randomUUID();
      const reply: Content = toContent({ role: 'assistant', content, toolCalls: calls });
      this.histories.set(chatId, [...contents, reply]);
    }

    log.debug('Model call finished', { agent: request.agent, model: request.model, tokens, toolCalls: calls.length });

    if (calls.length > 0) {
      return { kind: 'tool_calls', calls, content, chatId, tokens, model: request.model };
    }
    return { kind: 'final', content, chatId, tokens, model: request.model, finishReason };
  }
}
