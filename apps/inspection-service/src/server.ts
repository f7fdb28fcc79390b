import express from "express";
import { execSync } from "child_process";

import { ConfigurationError, createInferenceClient, InferenceClient } from "../../../src/ai-inspection-engine";
import { AppConfig, loadConfig } from "../../../src/lib/config";
import {
  clientErrorStatus,
  createCorsMiddleware,
  getRequestId,
  requestIdMiddleware,
  sendError,
} from "../../../src/lib/api-harden";
import { createInspectionRouter } from "../../../src/routes/inspectionRoutes";

function resolveGitSha() {
  try {
    return execSync("git rev-parse --short HEAD", { stdio: ["ignore", "pipe", "ignore"] }).toString().trim();
  } catch {
    return null;
  }
}

export function createHealthHandler(client: InferenceClient, version: string | null) {
  return (_req: express.Request, res: express.Response) => {
    res.json({
      ok: true,
      service: "inspection-assistant",
      version,
      provider: client.providerName,
      model: client.model,
    });
  };
}

export function errorHandler(err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) {
  if (res.headersSent) {
    return;
  }
  const message = err instanceof Error ? err.message : "Unknown";
  // body-parser marks malformed or oversized JSON with a 4xx status
  const status = clientErrorStatus(err);
  if (status !== undefined) {
    console.warn(`[Request] [${getRequestId(res)}] rejected with ${status}: ${message}`);
    sendError(res, status, status === 413 ? "Payload Too Large" : "Bad Request", message);
    return;
  }
  console.error(`Unhandled error [${getRequestId(res)}]`, err);
  sendError(res, 500, "Internal Server Error", message);
}

export function createApp(client: InferenceClient, config: AppConfig, version: string | null = null) {
  const app = express();

  app.use(requestIdMiddleware);
  app.use("/api", createCorsMiddleware(config.allowedOrigins));
  app.use(express.json({ limit: "1mb" }));

  app.use("/api/inspection", createInspectionRouter(client));

  app.get("/api/health", createHealthHandler(client, version));

  app.use(errorHandler);

  return app;
}

/**
 * A missing credential stops the process here, before any request is served.
 */
export function bootstrap(env: NodeJS.ProcessEnv = process.env) {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[Config] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const client = createInferenceClient(config);
  const app = createApp(client, config, env.GIT_SHA || resolveGitSha());
  app.listen(config.port, "0.0.0.0", () => {
    console.log(`Inspection assistant ready on port ${config.port} (provider=${config.provider} model=${config.model})`);
  });
}

if (process.env.NODE_ENV !== "test") {
  bootstrap();
}
