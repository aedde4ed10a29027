import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { buildInsightPrompt, InsightClient } from "./client.server";

describe("buildInsightPrompt", () => {
  it("names the title and includes the plot", () => {
    const prompt = buildInsightPrompt({ title: "Heat", overview: "A crew of thieves." });
    expect(prompt).toContain("for 'Heat'.");
    expect(prompt).toContain("Here is the plot:\n\nA crew of thieves.\n\n");
  });
});

describe("InsightClient", () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the trimmed completion", async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ choices: [{ message: { content: "  A tense heist film.\n" } }] }))
    );

    const result = await new InsightClient("test-perplexity").summarize({ title: "Heat", overview: "Thieves." });

    const init = fetchMock.mock.calls[0][1];
    expect(String(fetchMock.mock.calls[0][0])).toBe("https://api.perplexity.ai/chat/completions");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-perplexity");
    expect(JSON.parse(String(init?.body))).toMatchObject({ model: "sonar", temperature: 0.5, max_tokens: 512 });
    expect(result).toEqual({ success: true, data: "A tense heist film." });
  });

  it("surfaces the API's error message", async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ error: { message: "Invalid API key" } }), { status: 401 }));

    const result = await new InsightClient("test-perplexity").summarize({ title: "Heat", overview: "Thieves." });

    expect(result).toEqual({ success: false, error: { kind: "network", message: "Invalid API key", status: 401 } });
  });

  it("fails when the response has no content", async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ choices: [] })));

    const result = await new InsightClient("test-perplexity").summarize({ title: "Heat", overview: "Thieves." });

    expect(result).toEqual({ success: false, error: { kind: "network", message: "Unexpected API response" } });
  });
});
