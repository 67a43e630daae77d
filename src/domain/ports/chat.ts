/**
 * Chat Port
 *
 * Minimal chat-completion interface behind the LLM summarization provider.
 */

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatClient {
  /**
   * Send messages and return the text of the first reply.
   */
  complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string>;
}
