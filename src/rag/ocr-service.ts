import { RAG_CONFIG } from "./config.js";
import { chatCompletionSchema, postOpenRouter, type OpenRouterOptions } from "./openrouter.js";
import type { CallOptions, OcrEngine, PageImage } from "./types.js";

const OCR_INSTRUCTION =
  "Transcribe all text visible in this image exactly as written, preserving reading order, " +
  "line breaks, list items, button and menu labels. Do not describe the image or add commentary. " +
  "If there is no legible text, reply with an empty message.";

export function toDataUrl(image: PageImage): string {
  return `data:${image.mimeType};base64,${Buffer.from(image.bytes).toString("base64")}`;
}

/** OCR through a vision-capable chat model on OpenRouter. */
export class OpenRouterVisionOcr implements OcrEngine {
  constructor(
    private readonly options: OpenRouterOptions,
    readonly model: string = RAG_CONFIG.ocrModel,
  ) {}

  async recognize(image: PageImage, options?: CallOptions): Promise<string> {
    const json = await postOpenRouter(
      "chat/completions",
      {
        model: this.model,
        temperature: 0,
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: OCR_INSTRUCTION },
              { type: "image_url", image_url: { url: toDataUrl(image) } },
            ],
          },
        ],
      },
      chatCompletionSchema,
      { ...this.options, signal: options?.signal },
    );
    const choice = json.choices?.[0];
    if (!choice) {
      throw new Error("OCR model returned no choices");
    }
    return choice.message?.content ?? "";
  }
}
