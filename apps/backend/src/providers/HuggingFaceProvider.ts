import { z } from "zod";
import { boundRequest, failed, type CompletionRequest, type LLMProvider, type ModelResult } from "./LLMProvider.js";
import { postJson } from "./http.js";

const HF_INFERENCE_URL = "https://api-inference.huggingface.co/models";

const TextGenerationSchema = z.array(z.object({ generated_text: z.string() }));

export interface HuggingFaceProviderOptions {
  apiToken: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  baseUrl?: string;
}

/**
 * Text-generation models take a single input string, so the system prompt is
 * prepended to the user prompt.
 */
export class HuggingFaceProvider implements LLMProvider {
  readonly name = "huggingface";

  constructor(private readonly options: HuggingFaceProviderOptions) {}

  async generate(request: CompletionRequest): Promise<ModelResult> {
    const bounded = boundRequest(request, this.options.maxTokens);
    const inputs = bounded.system ? `${bounded.system}\n\n${bounded.prompt}` : bounded.prompt;
    // The inference API rejects a temperature of 0; greedy decoding is requested instead.
    const sampling =
      bounded.temperature > 0 ? { do_sample: true, temperature: bounded.temperature } : { do_sample: false };

    const result = await postJson(`${this.options.baseUrl ?? HF_INFERENCE_URL}/${this.options.model}`, {
      headers: { Authorization: `Bearer ${this.options.apiToken}` },
      body: {
        inputs,
        parameters: { max_new_tokens: bounded.maxTokens, return_full_text: false, ...sampling }
      },
      timeoutMs: this.options.timeoutMs
    });
    if (!result.ok) {
      return result;
    }

    const parsed = TextGenerationSchema.safeParse(result.payload);
    if (!parsed.success) {
      return failed("service_unavailable", "Unexpected text-generation payload");
    }
    const text = parsed.data[0]?.generated_text.trim() ?? "";
    if (!text) {
      return failed("service_unavailable", "Empty completion");
    }
    return { ok: true, text };
  }
}
