import { z } from "zod";
import { boundRequest, failed, type CompletionRequest, type LLMProvider, type ModelResult } from "./LLMProvider.js";
import { postJson } from "./http.js";

const GROQ_URL = "https://api.groq.com/openai/v1/chat/completions";

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional()
      })
    )
    .default([])
});

export interface GroqProviderOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  url?: string;
}

export class GroqProvider implements LLMProvider {
  readonly name = "groq";

  constructor(private readonly options: GroqProviderOptions) {}

  async generate(request: CompletionRequest): Promise<ModelResult> {
    const bounded = boundRequest(request, this.options.maxTokens);
    const messages = [
      ...(bounded.system ? [{ role: "system", content: bounded.system }] : []),
      { role: "user", content: bounded.prompt }
    ];

    const result = await postJson(this.options.url ?? GROQ_URL, {
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
      body: {
        model: this.options.model,
        messages,
        max_tokens: bounded.maxTokens,
        temperature: bounded.temperature,
        top_p: 0.9
      },
      timeoutMs: this.options.timeoutMs
    });
    if (!result.ok) {
      return result;
    }

    const parsed = ChatCompletionSchema.safeParse(result.payload);
    if (!parsed.success) {
      return failed("service_unavailable", "Unexpected completion payload");
    }
    const text = parsed.data.choices[0]?.message?.content?.trim() ?? "";
    if (!text) {
      return failed("service_unavailable", "Empty completion");
    }
    return { ok: true, text };
  }
}
