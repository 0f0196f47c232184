import type { MessageCreateParamsNonStreaming } from "@anthropic-ai/sdk/resources/messages";
import { RateLimitError, createWithRetry } from "../claudeRetry";

const params: MessageCreateParamsNonStreaming = {
  model: "test-model",
  max_tokens: 16,
  messages: [{ role: "user", content: "hello" }],
};

class StatusError extends Error {
  constructor(readonly status: number) {
    super(`status ${status}`);
  }
}

function clientFailing(times: number, status: number) {
  let calls = 0;
  const create = jest.fn(async (_params: MessageCreateParamsNonStreaming) => {
    calls++;
    if (calls <= times) throw new StatusError(status);
    return { id: "msg_test" };
  });
  return { messages: { create } };
}

beforeEach(() => {
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("createWithRetry", () => {
  it("returns the first successful response", async () => {
    const client = clientFailing(0, 429);
    await expect(createWithRetry(client, params, 0)).resolves.toEqual({ id: "msg_test" });
    expect(client.messages.create).toHaveBeenCalledTimes(1);
    expect(client.messages.create).toHaveBeenCalledWith(params);
  });

  it("retries rate-limited calls", async () => {
    const client = clientFailing(2, 429);
    await expect(createWithRetry(client, params, 0)).resolves.toEqual({ id: "msg_test" });
    expect(client.messages.create).toHaveBeenCalledTimes(3);
  });

  it("gives up with RateLimitError after three rate-limited calls", async () => {
    const client = clientFailing(3, 429);
    await expect(createWithRetry(client, params, 0)).rejects.toBeInstanceOf(RateLimitError);
    expect(client.messages.create).toHaveBeenCalledTimes(3);
  });

  it("rethrows other errors without retrying", async () => {
    const client = clientFailing(1, 500);
    await expect(createWithRetry(client, params, 0)).rejects.toThrow("status 500");
    expect(client.messages.create).toHaveBeenCalledTimes(1);
  });
});
