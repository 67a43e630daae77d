/**
 * LLM Infrastructure
 */

export { OpenAIChatClient, type OpenAIChatClientOptions } from "./openAIChatClient";
export {
  LlmSummarizationProvider,
  buildDocstringPrompt,
  buildSummaryPrompt,
  describeTarget,
} from "./llmSummarizationProvider";
