import dotenv from "dotenv";
dotenv.config();

import express from "express";
import cors from "cors";
import Anthropic from "@anthropic-ai/sdk";
import { loadGuardPolicy, loadServiceConfig } from "./config";
import type { ServiceConfig } from "./config";
import { DiversityGuard, InMemoryHistoryStore, PgHistoryStore, describeError } from "./guard";
import type { GuardPolicy, HistoryStore } from "./guard";
import { initDb } from "./migrate";
import { clerkVerifier } from "./middleware/auth";
import { createRecipesRouter } from "./routes/recipes";
import { createHttpEmbeddingProvider } from "./services/embeddings";
import { ClaudeRecipeGenerator } from "./services/recipeGenerator";

async function createStore(config: ServiceConfig, policy: GuardPolicy): Promise<HistoryStore> {
  if (config.store === "postgres") {
    await initDb();
    return new PgHistoryStore(policy.perComboCap);
  }
  console.log("Using in-memory avoid list (history is lost on restart)");
  return new InMemoryHistoryStore(policy.perComboCap);
}

async function start() {
  const config = loadServiceConfig();
  const policy = loadGuardPolicy();

  if (!config.anthropicApiKey) {
    throw new Error("ANTHROPIC_API_KEY not configured");
  }

  const store = await createStore(config, policy);
  const guard = new DiversityGuard({
    policy,
    store,
    embeddings: config.embeddings ? createHttpEmbeddingProvider(config.embeddings) : undefined,
  });
  const generator = new ClaudeRecipeGenerator(new Anthropic({ apiKey: config.anthropicApiKey }), {
    model: config.anthropicModel,
    temperature: config.temperature,
  });

  const app = express();

  app.use(cors());
  app.use(express.json());

  // Routes
  app.use("/api/recipes", createRecipesRouter({ guard, generator }, clerkVerifier(config.clerkSecretKey)));

  // Health check
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", store: config.store });
  });

  // Eviction pass for entries that aged out of the window
  const evictionTimer = setInterval(() => {
    guard.evictExpired()
      .then((count) => {
        if (count > 0) console.log(`[diversityGuard] Evicted ${count} expired avoid-list entries`);
      })
      .catch((err: unknown) => {
        console.error("[diversityGuard] Eviction failed:", describeError(err));
      });
  }, config.evictionIntervalMinutes * 60_000);
  evictionTimer.unref();

  app.listen(config.port, () => {
    console.log(`Recipify backend running on http://localhost:${config.port}`);
  });
}

start().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
