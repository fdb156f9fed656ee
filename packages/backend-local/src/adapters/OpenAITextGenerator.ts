import { z } from "zod";

import type { Logger } from "@taleroom/core/domain/ports/Logger.js";
import type { TextGenerator } from "@taleroom/core/domain/ports/TextGenerator.js";

interface OpenAITextGeneratorOptions {
  readonly apiKey: string;
  readonly model?: string;
  readonly baseUrl?: string;
  readonly temperature?: number;
  readonly logger?: Logger;
}

const ChatCompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

/** Chat-completions client for any OpenAI-compatible endpoint. */
export class OpenAITextGenerator implements TextGenerator {
  readonly #apiKey: string;
  readonly #model: string;
  readonly #baseUrl: string;
  readonly #temperature: number;
  readonly #logger: Logger | undefined;

  constructor({
    apiKey,
    model = "gpt-4o-mini",
    baseUrl = "https://api.openai.com/v1",
    temperature = 0.8,
    logger,
  }: OpenAITextGeneratorOptions) {
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY is required to generate text");
    }

    this.#apiKey = apiKey;
    this.#model = model;
    this.#baseUrl = baseUrl;
    this.#temperature = temperature;
    this.#logger = logger;
  }

  async generate(prompt: string): Promise<string> {
    const response = await fetch(`${this.#baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.#apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.#model,
        temperature: this.#temperature,
        messages: [{ role: "user", content: prompt }],
      }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`OpenAI text generation failed: ${response.status} ${text}`);
    }

    const payload = ChatCompletionResponse.safeParse(await response.json());
    if (!payload.success) {
      throw new Error("OpenAI response did not include a message");
    }

    const content = payload.data.choices[0]?.message.content?.trim() ?? "";
    if (!content) {
      throw new Error("OpenAI response was empty");
    }

    this.#logger?.debug("Text generated", { model: this.#model, length: content.length });
    return content;
  }
}
