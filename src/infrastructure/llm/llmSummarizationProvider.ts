/**
 * LLM Summarization Provider
 *
 * Turns summarization and docstring requests into chat prompts.
 */

import type {
  ChatClient,
  ChatMessage,
  DocstringRequest,
  SummarizationProvider,
  SummaryContext,
} from "../../domain/ports";

const SYSTEM_PROMPT =
  "You write concise, accurate technical documentation for Python source code. " +
  "Answer with the requested text only.";

export class LlmSummarizationProvider implements SummarizationProvider {
  constructor(private readonly chat: ChatClient) {}

  summarize(text: string, context: SummaryContext, signal?: AbortSignal): Promise<string> {
    return this.chat.complete(withSystem(buildSummaryPrompt(text, context)), signal);
  }

  generateDocstring(request: DocstringRequest, signal?: AbortSignal): Promise<string> {
    return this.chat.complete(withSystem(buildDocstringPrompt(request)), signal);
  }
}

function withSystem(prompt: string): ChatMessage[] {
  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: prompt },
  ];
}

/**
 * What a summary describes, as a phrase for prompts.
 */
export function describeTarget(context: Pick<SummaryContext, "scope" | "name">): string {
  switch (context.scope) {
    case "function":
      return `Python function \`${context.name}\``;
    case "class":
      return `Python class \`${context.name}\``;
    case "module":
      return `Python module \`${context.name}\``;
    case "directory":
      return `directory \`${context.name}\``;
    case "project":
      return `project \`${context.name}\``;
  }
}

export function buildSummaryPrompt(text: string, context: SummaryContext): string {
  const target = describeTarget(context);

  if (context.part?.stage === "chunk") {
    return [
      `You are summarizing chunk #${context.part.index + 1} of ${context.part.total} of a large ${target}.`,
      "Focus on key functionality, classes, dependencies and purpose.",
      "",
      text,
    ].join("\n");
  }

  if (context.part?.stage === "combine") {
    const lines = [
      `Combine these chunk-level summaries of the ${target} into one cohesive final summary:`,
      "",
      text,
    ];
    if (context.children.length > 0) {
      lines.push("", "Include what its members do:", ...memberLines(context.children));
    }
    return lines.join("\n");
  }

  if (context.scope === "directory" || context.scope === "project") {
    return [
      `Summarize the ${target} from the summaries of its contents.`,
      "Describe its overall purpose and how the parts fit together in one or two paragraphs.",
      "",
      text,
    ].join("\n");
  }

  const lines = [
    `Summarize the ${target} in \`${context.path}\`.`,
    "Describe what it does, its inputs and outputs, and notable dependencies in a few sentences.",
  ];
  if (context.signature && context.signature.length > 0) {
    lines.push(`Signature: (${context.signature.join(", ")})`);
  }
  if (context.children.length > 0) {
    lines.push(
      "",
      "Summaries of its members (their bodies are elided below):",
      ...memberLines(context.children)
    );
  }
  lines.push("", "Source:", text);
  return lines.join("\n");
}

function memberLines(children: SummaryContext["children"]): string[] {
  return children.map((child) => `- ${child.name} (${child.scope}): ${child.summary}`);
}

export function buildDocstringPrompt(request: DocstringRequest): string {
  const target = describeTarget({ scope: request.kind, name: request.qualifiedName });
  const lines = [
    `Analyze the following ${target} and write a docstring for it that follows PEP 257.`,
    "Start with a one-line summary. Describe parameters, return values and raised errors where they matter.",
  ];
  if (request.kind !== "module") {
    lines.push(`Declaration: ${request.signature}`);
  }
  if (request.existingDocstring) {
    lines.push("", "Current docstring (may be outdated):", request.existingDocstring);
  }
  lines.push("", "Source:", request.body, "", "Docstring only (do not enclose in triple quotes).");
  return lines.join("\n");
}
