import { EmbeddingProviderError, createHttpEmbeddingProvider } from "../embeddings";

const ENDPOINT = "http://localhost:8080/v1/embeddings";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

beforeEach(() => {
  jest.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("createHttpEmbeddingProvider", () => {
  it("posts the text and returns the first embedding", async () => {
    const fetchSpy = jest.spyOn(globalThis, "fetch").mockResolvedValue(
      jsonResponse({ data: [{ embedding: [0.25, -0.5], index: 0 }] }),
    );
    const provider = createHttpEmbeddingProvider({ url: ENDPOINT, apiKey: "test-secret", model: "test-embed" });

    await expect(provider.embed("Chicken Rice Bowl")).resolves.toEqual([0.25, -0.5]);
    expect(fetchSpy).toHaveBeenCalledWith(ENDPOINT, expect.objectContaining({
      method: "POST",
      headers: { "Content-Type": "application/json", Authorization: "Bearer test-secret" },
      body: '{"model":"test-embed","input":"Chicken Rice Bowl"}',
    }));
  });

  it("omits the Authorization header without an API key", async () => {
    const fetchSpy = jest.spyOn(globalThis, "fetch").mockResolvedValue(
      jsonResponse({ data: [{ embedding: [1], index: 0 }] }),
    );
    const provider = createHttpEmbeddingProvider({ url: ENDPOINT, model: "test-embed" });

    await provider.embed("rice");
    expect(fetchSpy).toHaveBeenCalledWith(ENDPOINT, expect.objectContaining({
      headers: { "Content-Type": "application/json" },
    }));
  });

  it("fails on a non-OK status", async () => {
    jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ error: "nope" }, 503));
    const provider = createHttpEmbeddingProvider({ url: ENDPOINT, model: "test-embed" });

    await expect(provider.embed("rice")).rejects.toThrow("Embedding API returned 503");
  });

  it("fails on an unexpected payload", async () => {
    jest.spyOn(globalThis, "fetch").mockResolvedValue(jsonResponse({ data: [{ embedding: ["x"] }] }));
    const provider = createHttpEmbeddingProvider({ url: ENDPOINT, model: "test-embed" });

    await expect(provider.embed("rice")).rejects.toBeInstanceOf(EmbeddingProviderError);
  });
});
