import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PermanentTaggingError, TransientTaggingError } from "./errors";
import { OllamaVisionTagger } from "./ollama-vision-tagger";

const request = {
  image: Buffer.from("jpeg-bytes"),
  instruction: "Describe this photo",
  generation: { temperature: 0.1, num_predict: 100 },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("OllamaVisionTagger", () => {
  const fetchMock = vi.fn<typeof fetch>();
  const tagger = new OllamaVisionTagger({
    baseUrl: "http://localhost:11434/",
    model: "llava:13b",
    timeoutMs: 1_000,
  });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a non-streaming generate request with the image in base64", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ response: "Lake, Forest" }));

    await expect(tagger.infer(request)).resolves.toBe("Lake, Forest");

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:11434/api/generate");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "llava:13b",
      prompt: "Describe this photo",
      images: [Buffer.from("jpeg-bytes").toString("base64")],
      stream: false,
      options: { temperature: 0.1, num_predict: 100 },
    });
  });

  it("classifies 5xx, 429 and 408 as transient", async () => {
    for (const status of [500, 503, 429, 408]) {
      fetchMock.mockResolvedValueOnce(new Response("busy", { status }));
      await expect(tagger.infer(request)).rejects.toBeInstanceOf(TransientTaggingError);
    }
  });

  it("classifies other 4xx as permanent", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: "model not found" }, 404));
    await expect(tagger.infer(request)).rejects.toBeInstanceOf(PermanentTaggingError);
  });

  it("classifies network failures and timeouts as transient", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    await expect(tagger.infer(request)).rejects.toBeInstanceOf(TransientTaggingError);

    fetchMock.mockRejectedValueOnce(
      Object.assign(new Error("The operation was aborted due to timeout"), {
        name: "TimeoutError",
      }),
    );
    await expect(tagger.infer(request)).rejects.toThrow(/timed out/);
  });

  it("classifies a timeout while reading the body as transient", async () => {
    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), {
      name: "TimeoutError",
    });
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(timeout);
      },
    });
    fetchMock.mockResolvedValueOnce(new Response(body, { status: 200 }));

    const rejection = tagger.infer(request);
    await expect(rejection).rejects.toBeInstanceOf(TransientTaggingError);
    await expect(rejection).rejects.toThrow("http://localhost:11434/api/generate");
  });

  it("treats malformed bodies as permanent", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>oops</html>", { status: 200 }));
    await expect(tagger.infer(request)).rejects.toBeInstanceOf(PermanentTaggingError);

    fetchMock.mockResolvedValueOnce(jsonResponse({ done: true }));
    await expect(tagger.infer(request)).rejects.toThrow("missing response text");
  });

  it("lists installed models sorted by name", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ models: [{ name: "qwen2.5vl:7b" }, { name: "llava:13b" }, { size: 1 }] }),
    );

    await expect(tagger.listModels()).resolves.toEqual(["llava:13b", "qwen2.5vl:7b"]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://localhost:11434/api/tags");
  });

  it("reports availability without throwing", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ models: [] }));
    await expect(tagger.isAvailable()).resolves.toBe(true);

    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    await expect(tagger.isAvailable()).resolves.toBe(false);
  });
});
