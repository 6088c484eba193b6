import Groq from 'groq-sdk';

export const MODELS = {
  // Fast model for quick responses
  FAST: 'llama-3.1-8b-instant',
  // More capable model for complex reasoning
  SMART: 'llama-3.3-70b-versatile',
} as const;

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask the model for a JSON object response. */
  jsonMode?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type ChatFn = (messages: ChatMessage[], options?: ChatOptions) => Promise<string>;

/**
 * Chat-completion call bound to one Groq client. Retries are disabled so the
 * configured timeout bounds the whole call.
 */
export function createGroqChat(apiKey: string): ChatFn {
  const groq = new Groq({ apiKey, maxRetries: 0 });

  return async (messages, options) => {
    const response = await groq.chat.completions.create(
      {
        model: options?.model || MODELS.SMART,
        messages,
        temperature: options?.temperature ?? 0.1,
        max_tokens: options?.maxTokens ?? 2048,
        response_format: options?.jsonMode ? { type: 'json_object' } : undefined,
      },
      {
        timeout: options?.timeoutMs,
        signal: options?.signal,
      }
    );

    return response.choices[0]?.message?.content || '';
  };
}
