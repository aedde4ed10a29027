/**
 * Perplexity chat-completions client for short AI write-ups of a title.
 * Optional: createInsightClient() returns null when no API key is configured.
 */

import { env } from "~/lib/env.server";
import { fail, fromFetchError, ok, type ServiceResult } from "~/lib/errors";
import { createLogger } from "~/lib/logger.server";

const PERPLEXITY_URL = "https://api.perplexity.ai/chat/completions";
const INSIGHT_MODEL = "sonar";
const INSIGHT_REQUEST_TIMEOUT = 30000;

const logger = createLogger("Insight");

export interface InsightSubject {
  title: string;
  overview: string;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string } }>;
  error?: { message?: string };
}

export function buildInsightPrompt({ title, overview }: InsightSubject): string {
  return (
    `Give a short, fun summary, trivia, and 3 similar movie recommendations for ` +
    `'${title}'. Don't use any fancy markdown formats. Here is the plot:\n\n${overview}\n\n` +
    `Format your answer as:\n` +
    `- Short summary\n- Trivia bullets\n- Recommended movies`
  );
}

export class InsightClient {
  private readonly apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  async summarize(subject: InsightSubject): Promise<ServiceResult<string>> {
    const payload = {
      model: INSIGHT_MODEL,
      messages: [
        { role: "system", content: "You are a friendly movie expert." },
        { role: "user", content: buildInsightPrompt(subject) },
      ],
      temperature: 0.5,
      max_tokens: 512,
      stream: false,
    };

    try {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), INSIGHT_REQUEST_TIMEOUT);

      const response = await fetch(PERPLEXITY_URL, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      let data: ChatCompletionResponse = {};
      try {
        data = await response.json();
      } catch {
        if (response.ok) {
          return fail("network", "Failed to decode JSON");
        }
      }

      if (!response.ok) {
        const message = data.error?.message ?? "Perplexity API error";
        logger.error(`Request failed: ${message}`, { status: response.status });
        return fail("network", message, response.status);
      }

      const content = data.choices?.[0]?.message?.content;
      if (!content) {
        return fail("network", "Unexpected API response");
      }

      logger.info(`Generated insight for "${subject.title}"`);
      return ok(content.trim());
    } catch (error) {
      return fromFetchError(error);
    }
  }
}

/**
 * Create an InsightClient if the Perplexity key is configured.
 */
export function createInsightClient(): InsightClient | null {
  const apiKey = env.PERPLEXITY_API_KEY;
  if (!apiKey) {
    return null;
  }
  return new InsightClient(apiKey);
}

export const INSIGHTS_DISABLED_MESSAGE =
  "AI insights are not configured. Add PERPLEXITY_API_KEY to your .env to enable them.";
