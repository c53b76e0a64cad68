import { RAG_CONFIG } from "./config.js";
import { chatCompletionSchema, postOpenRouter, type OpenRouterOptions } from "./openrouter.js";
import type { CallOptions, GenerationProvider, Prompt } from "./types.js";

export class OpenRouterChatProvider implements GenerationProvider {
  constructor(
    private readonly options: OpenRouterOptions,
    readonly model: string = RAG_CONFIG.chatModel,
    private readonly temperature: number = RAG_CONFIG.chatTemperature,
  ) {}

  async generate(prompt: Prompt, options?: CallOptions): Promise<string> {
    const json = await postOpenRouter(
      "chat/completions",
      {
        model: this.model,
        temperature: this.temperature,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
      },
      chatCompletionSchema,
      { ...this.options, signal: options?.signal },
    );
    return json.choices?.[0]?.message?.content?.trim() ?? "";
  }
}
