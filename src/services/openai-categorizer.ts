/**
 * OpenAI Categorizer
 * Asks a chat model for a category, tags and insights as JSON
 */

import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { parseCategorization } from "../utils/parse-categorization";
import type { Categorization, Categorizer } from "../types";

const SYSTEM_PROMPT = `You categorize scanned business documents.
Reply with a JSON object only: {"category": string, "tags": string[], "insights": string[]}.
"category" is a short lowercase noun such as "invoice", "receipt", "contract" or "letter".
"tags" are short keywords. "insights" are one-sentence observations.`;

// Longer documents are truncated before they are sent
const MAX_INPUT_CHARS = 12000;

/**
 * The part of the OpenAI client the categorizer calls
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

export class OpenAiCategorizer implements Categorizer {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly model: string,
  ) {}

  static fromApiKey(apiKey: string, model: string): OpenAiCategorizer {
    return new OpenAiCategorizer(new OpenAI({ apiKey }), model);
  }

  async categorize(text: string): Promise<Categorization> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: text.slice(0, MAX_INPUT_CHARS) },
      ],
    });

    return parseCategorization(completion.choices[0]?.message.content);
  }
}
