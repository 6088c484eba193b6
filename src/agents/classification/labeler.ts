import { z } from 'zod';
import { createGroqChat, MODELS } from '../../config/groq';
import type { ChatFn } from '../../config/groq';
import type { AppConfig } from '../../config/settings';
import type { AiLabel } from '../../types';

/**
 * AI fallback used for browser activity. Implementations never reject:
 * every failure resolves to 'Private'.
 */
export interface ActivityLabeler {
  label(app: string, title: string, options?: { signal?: AbortSignal }): Promise<AiLabel>;
}

const SYSTEM_PROMPT = `You are an activity classification agent for an employee time-tracking platform. You receive a JSON object with an "app" and a "title" describing the window a user had in focus.

Classify the activity as either "Work" or "Private".

Respond ONLY with a valid JSON object containing a single key "category" whose value is "Work" or "Private". Do not include any other keys, text, explanations, or markdown.

Example Input: {"app": "Google Chrome", "title": "Pull Request #42 - GitHub"}
Example Output: {"category": "Work"}

Example Input: {"app": "Firefox", "title": "Cat videos compilation - YouTube"}
Example Output: {"category": "Private"}

If the category is ambiguous, always answer "Private".`;

const labelSchema = z
  .object({
    category: z.enum(['Work', 'Private']),
  })
  .strict();

/**
 * Parse a model response into a label. Returns null when the content is not
 * exactly `{ "category": "Work" | "Private" }`.
 */
export function parseLabel(content: string): AiLabel | null {
  // Extract JSON from a fenced block if the model added one
  let jsonStr = content;
  const jsonMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonMatch) {
    jsonStr = jsonMatch[1];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr.trim());
  } catch {
    return null;
  }

  const result = labelSchema.safeParse(parsed);
  return result.success ? result.data.category : null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

export interface AiLabelerOptions {
  chat: ChatFn;
  model?: string;
  timeoutMs: number;
}

export function createAiLabeler({ chat, model = MODELS.FAST, timeoutMs }: AiLabelerOptions): ActivityLabeler {
  return {
    async label(app, title, options) {
      try {
        const content = await chat(
          [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: JSON.stringify({ app, title }) },
          ],
          {
            model,
            temperature: 0,
            maxTokens: 50,
            jsonMode: true,
            timeoutMs,
            signal: options?.signal,
          }
        );

        const label = parseLabel(content);
        if (!label) {
          // Titles are never logged
          console.warn(`AI classification returned an unusable response for app "${app}"; defaulting to Private`);
          return 'Private';
        }

        return label;
      } catch (error) {
        console.warn(`AI classification failed for app "${app}" (${describeError(error)}); defaulting to Private`);
        return 'Private';
      }
    },
  };
}

/** Labeler for deployments without an AI key. */
export function createOfflineLabeler(): ActivityLabeler {
  return {
    async label() {
      return 'Private';
    },
  };
}

export function createLabelerFromConfig(ai: AppConfig['ai']): ActivityLabeler {
  if (!ai.apiKey) {
    console.warn('GROQ_API_KEY is not set; browser activity will be classified as Private');
    return createOfflineLabeler();
  }

  return createAiLabeler({
    chat: createGroqChat(ai.apiKey),
    model: ai.model,
    timeoutMs: ai.timeoutMs,
  });
}
