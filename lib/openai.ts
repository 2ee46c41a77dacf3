// lib/openai.ts
import OpenAI from "openai";
import type { Configuration } from "./types";
import { getMaxTokens, getModel, getTemperature } from "./config";
import { AppError } from "./errors";

export type ChatMessage = {
  role: "system" | "user";
  content: string;
};

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
};

/**
 * One blocking round trip to a chat-completion endpoint, returning the
 * first choice's text.
 */
export type ChatCompleter = (request: ChatCompletionRequest) => Promise<string>;

export function buildChatRequest(
  config: Configuration,
  systemContent: string,
  userContent: string
): ChatCompletionRequest {
  return {
    model: getModel(config),
    messages: [
      { role: "system", content: systemContent },
      { role: "user", content: userContent },
    ],
    max_tokens: getMaxTokens(config),
    temperature: getTemperature(config),
  };
}

/**
 * Try to grab text from either a plain string or the
 * "array of content parts" format that some models use.
 */
export function extractTextFromMessageContent(content: unknown): string {
  if (!content) return "";
  if (typeof content === "string") return content;
  if (Array.isArray(content)) {
    return content
      .map((part: unknown) => {
        if (typeof part === "string") return part;
        if (typeof part === "object" && part !== null && "text" in part) {
          const text = part.text;
          if (typeof text === "string") return text;
          if (typeof text === "object" && text !== null && "value" in text && typeof text.value === "string") {
            return text.value;
          }
        }
        return "";
      })
      .filter(Boolean)
      .join("\n");
  }
  return "";
}

export function createOpenAICompleter(apiKey: string): ChatCompleter {
  const client = new OpenAI({ apiKey });

  return async (request) => {
    const completion = await client.chat.completions.create({
      model: request.model,
      messages: request.messages,
      max_tokens: request.max_tokens,
      temperature: request.temperature,
    });

    const message = completion.choices[0]?.message;
    const content = extractTextFromMessageContent(message?.content);

    if (!content) {
      throw new AppError("remote", "Empty content from model");
    }

    return content;
  };
}
