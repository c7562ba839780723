import type { Candidate } from './candidate';

export interface ToolCall {
  id: string;
  name: string;
  /** JSON text as the provider sent it. */
  arguments: string;
}

export type ChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; toolCallId: string; name: string; content: string };

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON schema of the arguments object. */
  parameters: Record<string, unknown>;
}

export interface ProviderRequest {
  modelId: string;
  messages: ChatMessage[];
  maxTokens?: number;
  tools?: ToolDefinition[];
}

export type ProviderStatus = 'ok' | 'error' | 'timeout';

export interface ProviderCallResult {
  status: ProviderStatus;
  content: string;
  toolCalls?: ToolCall[];
  promptTokens?: number;
  completionTokens?: number;
  error?: string;
}

/**
 * A source of moves. Implementations report failures through `status`
 * instead of throwing, and should stop work once `signal` aborts.
 */
export interface ModelProvider {
  readonly id: string;
  readonly modelId: string;
  readonly name?: string;
  call(request: ProviderRequest, signal: AbortSignal): Promise<ProviderCallResult>;
}

/** Static substitutes, keyed by the id of the provider they stand in for. */
export type FallbackChain = ReadonlyMap<string, ModelProvider>;

export type ProgressEvent =
  | { type: 'start'; providerId: string; modelId: string }
  | { type: 'retry'; providerId: string; attempt: number; reason: string; remainingMs: number }
  | { type: 'fallback'; providerId: string; from: string; to: string }
  | { type: 'tool'; providerId: string; tool: string; result: Record<string, unknown> }
  | { type: 'result'; candidate: Candidate };

export type ProgressSink = (event: ProgressEvent) => void | Promise<void>;
