/**
 * OpenAI Chat Client
 *
 * Implements the ChatClient port with the OpenAI chat completions API.
 * Retries are left to the node summarizer, so the SDK's own are disabled.
 */

import OpenAI from "openai";
import type { LlmConfig } from "../../domain/entities";
import type { ChatClient, ChatMessage } from "../../domain/ports";

export interface OpenAIChatClientOptions extends LlmConfig {
  apiKey: string;
}

export class OpenAIChatClient implements ChatClient {
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(options: OpenAIChatClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL || undefined,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
    this.model = options.model;
    this.temperature = options.temperature;
  }

  async complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        messages: messages.map((message) => ({ role: message.role, content: message.content })),
      },
      { signal }
    );

    return response.choices[0]?.message?.content ?? "";
  }
}
