import Fastify, { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import { ZodError } from "zod";

import type { AppConfig } from "./config";
import { createAnalysisController } from "./controllers/analysisController";
import { createUploadController } from "./controllers/uploadController";
import { AppError } from "./errors";
import { registerRecordRoutes } from "./routes/records";
import type { RecordStore } from "./services/recordStore";
import { loggerOptions } from "./utils/logger";

export type GatewaySettings = Pick<AppConfig, "logLevel" | "corsOrigins" | "maxUploadBytes">;

// Routes
export const registerRoutes = (app: FastifyInstance, store: RecordStore): void => {
  const upload = createUploadController(store);
  const analysis = createAnalysisController(store);

  app.get("/", async () => {
    return { message: "API is running" };
  });

  app.post("/upload-csv", upload.uploadCsv);
  registerRecordRoutes(app, store);
  app.get("/analyze", analysis.getAnalysis);
};

function registerErrorHandlers(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return reply.status(400).send({ success: false, error: `${where}${issue.message}` });
    }

    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply.status(error.statusCode).send({ success: false, error: error.message });
    }

    // Fastify's own client errors (bad JSON, file too large, ...)
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ success: false, error: error.message });
    }

    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({ success: false, error: "Internal server error" });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      success: false,
      error: `Route ${request.method} ${request.url} not found`,
    });
  });
}

/**
 * Build the HTTP application around an injected record store
 */
export async function buildApp(
  store: RecordStore,
  settings: GatewaySettings
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: loggerOptions(settings.logLevel),
    ignoreTrailingSlash: true,
  });

  await app.register(cors, { origin: settings.corsOrigins });
  await app.register(multipart, {
    limits: {
      fileSize: settings.maxUploadBytes,
      files: 1,
    },
  });

  registerErrorHandlers(app);
  registerRoutes(app, store);
  return app;
}

// Build the app and start listening
export async function startServer(
  store: RecordStore,
  config: AppConfig
): Promise<FastifyInstance> {
  const app = await buildApp(store, config);
  await app.listen({ port: config.port, host: config.host });
  return app;
}
