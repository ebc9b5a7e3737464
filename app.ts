import express from "express";
import cors from "cors";
import { createBulkEnrichRouter, type StartJob } from "./api/bulkEnrich.js";
import { createEnrichRouter } from "./api/enrich.js";
import type { AppContext } from "./services/context.js";

export function healthBody(context: AppContext, now: number = Date.now()) {
  const usage = context.usage.snapshot();
  return {
    status: "healthy",
    timestamp: now / 1000,
    token_usage: {
      input_tokens: usage.totalInputTokens,
      output_tokens: usage.totalOutputTokens,
      total_tokens: usage.totalTokens,
      cost_inr: usage.totalCostInr
    }
  };
}

export interface AppOptions {
  // Schedules accepted bulk jobs; defaults to running them in-process.
  startJob?: StartJob;
}

export function createApp(context: AppContext, options: AppOptions = {}) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json(healthBody(context));
  });

  app.use("/api/v1/enrich", createEnrichRouter(context));
  app.use("/api/v1/bulk-enrich", createBulkEnrichRouter(context, options.startJob));

  return app;
}
