import { z } from "zod";
import { ProviderHttpError } from "./errors.js";

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1/";

export const chatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }).optional() }))
    .optional(),
});

export interface OpenRouterOptions {
  apiKey: string;
  baseUrl?: string;
}

export async function postOpenRouter<T>(
  endpoint: string,
  body: unknown,
  schema: z.ZodType<T>,
  options: OpenRouterOptions & { signal?: AbortSignal },
): Promise<T> {
  if (!options.apiKey) {
    throw new Error("OpenRouter API key is required.");
  }

  const baseUrl = options.baseUrl ?? OPENROUTER_BASE_URL;
  const res = await fetch(new URL(endpoint, baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`), {
    method: "POST",
    headers: {
      Authorization: `Bearer ${options.apiKey}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
    signal: options.signal,
  });

  if (!res.ok) {
    const text = await res.text();
    throw new ProviderHttpError("OpenRouter", res.status, text);
  }

  const json: unknown = await res.json();
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`OpenRouter ${endpoint} response is malformed: ${parsed.error.message}`);
  }
  return parsed.data;
}
