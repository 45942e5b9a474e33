/**
 * Fixed chat templates used to render a message list into one prompt
 */

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type ChatTemplateName = "llama3" | "chatml";

export interface ChatTemplate {
  name: ChatTemplateName;
  /** Markers that end an assistant turn, always passed to the engine as stop triggers */
  stop: string[];
  render(messages: readonly ChatMessage[]): string;
}

const llama3: ChatTemplate = {
  name: "llama3",
  stop: ["<|eot_id|>"],
  render(messages) {
    const turns = messages
      .map((message) => `<|start_header_id|>${message.role}<|end_header_id|>\n\n${message.content}<|eot_id|>`)
      .join("");
    return `<|begin_of_text|>${turns}<|start_header_id|>assistant<|end_header_id|>\n\n`;
  },
};

const chatml: ChatTemplate = {
  name: "chatml",
  stop: ["<|im_end|>"],
  render(messages) {
    const turns = messages
      .map((message) => `<|im_start|>${message.role}\n${message.content}<|im_end|>\n`)
      .join("");
    return `${turns}<|im_start|>assistant\n`;
  },
};

const TEMPLATES: Record<ChatTemplateName, ChatTemplate> = { llama3, chatml };

export function getChatTemplate(name: ChatTemplateName): ChatTemplate {
  return TEMPLATES[name];
}
