import { verifyToken } from "@clerk/express";
import type { ErrorResponse } from "../../../shared/types";
import { describeError } from "../guard/errors";

// Extend Express Request with the verified user id
declare global {
  namespace Express {
    interface Request {
      userId?: string;
    }
  }
}

export type TokenVerifier = (token: string) => Promise<{ sub?: string }>;

/** What the handlers read off a request. Express's Request satisfies it. */
export interface AuthRequest {
  headers: { authorization?: string };
  userId?: string;
}

/** What the handlers call on a response. Express's Response satisfies it. */
export interface JsonReply<Body> {
  status(code: number): JsonReply<Body>;
  json(body: Body): unknown;
}

export function clerkVerifier(secretKey: string | undefined): TokenVerifier {
  return (token) => verifyToken(token, { secretKey });
}

function bearerToken(req: AuthRequest): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith("Bearer ")) return null;
  return authHeader.slice(7);
}

/**
 * Middleware that requires a valid Clerk JWT.
 * Returns 401 if no valid token is present. Attaches req.userId (the token subject).
 */
export function requireAuth(verify: TokenVerifier) {
  return async (req: AuthRequest, res: JsonReply<ErrorResponse>, next: () => void): Promise<void> => {
    const token = bearerToken(req);
    if (!token) {
      res.status(401).json({ error: "Authentication required" });
      return;
    }

    try {
      const verified = await verify(token);
      if (!verified.sub) {
        res.status(401).json({ error: "Invalid token" });
        return;
      }
      req.userId = verified.sub;
    } catch (err: unknown) {
      console.error("Auth error:", describeError(err));
      res.status(401).json({ error: "Invalid or expired token" });
      return;
    }
    next();
  };
}
