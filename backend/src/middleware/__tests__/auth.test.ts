/**
 * requireAuth: unit tests
 *
 * Runs the middleware with a fake verifier and stub request and response
 * objects.
 */

import type { ErrorResponse } from "../../../../shared/types";
import { requireAuth } from "../auth";
import type { AuthRequest, TokenVerifier } from "../auth";
import { RecordingReply } from "../../__tests__/fixtures";

function run(verify: TokenVerifier, authorization?: string) {
  const req: AuthRequest = { headers: authorization === undefined ? {} : { authorization } };
  const res = new RecordingReply<ErrorResponse>();
  const next = jest.fn();
  return { req, res, next, done: requireAuth(verify)(req, res, next) };
}

beforeEach(() => {
  jest.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("requireAuth", () => {
  it("attaches the token subject and moves on", async () => {
    const verify = jest.fn(async () => ({ sub: "user_1" }));
    const { req, res, next, done } = run(verify, "Bearer test-token");
    await done;

    expect(verify).toHaveBeenCalledWith("test-token");
    expect(req.userId).toBe("user_1");
    expect(next).toHaveBeenCalledTimes(1);
    expect(res.statusCode).toBe(200);
    expect(res.body).toBeUndefined();
  });

  it("answers 401 without a bearer token", async () => {
    const verify = jest.fn(async () => ({ sub: "user_1" }));

    for (const header of [undefined, "", "Basic dGVzdDp0ZXN0", "bearer test-token"]) {
      const { res, next, done } = run(verify, header);
      await done;
      expect(res.statusCode).toBe(401);
      expect(res.body).toEqual({ error: "Authentication required" });
      expect(next).not.toHaveBeenCalled();
    }
    expect(verify).not.toHaveBeenCalled();
  });

  it("answers 401 when the verifier rejects the token", async () => {
    const verify = jest.fn(async () => {
      throw new Error("token expired");
    });
    const { req, res, next, done } = run(verify, "Bearer test-token");
    await done;

    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ error: "Invalid or expired token" });
    expect(req.userId).toBeUndefined();
    expect(next).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith("Auth error:", "token expired");
  });

  it("answers 401 for a token with no subject", async () => {
    const { req, res, next, done } = run(async () => ({}), "Bearer test-token");
    await done;

    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ error: "Invalid token" });
    expect(req.userId).toBeUndefined();
    expect(next).not.toHaveBeenCalled();
  });
});
