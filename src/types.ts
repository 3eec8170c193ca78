export type Role = 'system' | 'user' | 'assistant' | 'tool' | 'function';

export type ImageDetail = 'auto' | 'low' | 'high';

export type UserContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string; detail?: ImageDetail } };

export type UserContent = string | UserContentPart[];

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: UserContent }
  | { role: 'assistant'; content: string; tool_calls?: ToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string }
  | { role: 'function'; content: string; name: string };

export type ToolSchema = {
  type: 'function';
  function: {
    name: string;
    description?: string;
    // OpenAI style JSON schema
    parameters: Record<string, unknown>;
  };
};

export type ToolCall = {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
};

export type WireUsage = {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
};

export type ChatCompletionResponse = {
  id?: string;
  model?: string;
  created?: number;
  system_fingerprint?: string;
  choices: Array<{
    index: number;
    message?: {
      role?: Role;
      content?: string | null;
      refusal?: string | null;
      tool_calls?: ToolCall[];
    };
    finish_reason?: string | null;
  }>;
  usage?: WireUsage;
};

export type EmbeddingResponse = {
  model?: string;
  data: Array<{ index: number; embedding: number[] }>;
  usage?: WireUsage;
};

// ── Streaming domain model ──────────────────────────────────────────────

export type ChatContentPart =
  | { kind: 'text'; text: string }
  | { kind: 'image'; imageUrl: string; detail?: ImageDetail };

export type ToolCallUpdate = {
  index: number;
  id?: string;
  functionName?: string;
  argumentsUpdate?: string;
};

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};

/**
 * One partial delta of a streaming chat completion. Any absent field means
 * "unchanged since the previous update".
 */
export type StreamingChatUpdate = {
  id?: string;
  model?: string;
  created?: number;
  systemFingerprint?: string;
  choiceIndex?: number;
  role?: Role;
  contentUpdate?: ChatContentPart[];
  refusalUpdate?: string;
  toolCallUpdates?: ToolCallUpdate[];
  finishReason?: string;
  usage?: TokenUsage;
};

/** Aggregated result of one streaming call, built when its scope finalizes. */
export type StreamingCompletionSummary = {
  responseId: string | null;
  responseModel: string | null;
  role: Role | null;
  finishReason: string | null;
  usage: TokenUsage | null;
  content: ChatContentPart;
  toolCalls: ToolCall[];
};

export type FinalizeCause =
  | { kind: 'completed' }
  | { kind: 'failed'; error: unknown }
  | { kind: 'cancelled' };

// ── Requests ────────────────────────────────────────────────────────────

export type ChatRequest = {
  model?: string;
  messages: ChatMessage[];
  tools?: ToolSchema[];
  toolChoice?: 'auto' | 'none' | 'required' | { type: 'function'; function: { name: string } };
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  /** Merged verbatim into the request body. */
  extra?: Record<string, unknown>;
};

export type EmbeddingRequest = {
  model?: string;
  input: string | string[];
  dimensions?: number;
};

/**
 * Per-call context. `instrumented` is set by an outer call that already owns
 * a telemetry scope so helpers it invokes do not start their own.
 */
export type CallContext = {
  signal?: AbortSignal;
  instrumented?: boolean;
};
