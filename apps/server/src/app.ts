// apps/server/src/app.ts
import Fastify, { type FastifyBaseLogger } from "fastify";
import fastifyCors from "@fastify/cors";
import type { Logger } from "./logger.js";
import type { RagService } from "./lib/rag/index.js";
import { registerChatRoutes } from "./routes/chat.js";
import { registerRagRoutes } from "./routes/rag.js";

export interface AppOptions {
  service: RagService;
  logger: Logger;
}

export async function buildApp({ service, logger }: AppOptions) {
  const loggerInstance: FastifyBaseLogger = logger;
  const app = Fastify({ loggerInstance });

  await app.register(fastifyCors, { origin: true });

  app.get("/health", async (_req, reply) =>
    reply.send({ ok: true, ready: service.isReady, chunks: service.chunkCount })
  );

  await registerRagRoutes(app, service);
  await registerChatRoutes(app, service);

  app.setNotFoundHandler((_req, reply) => reply.code(404).send({ ok: false, error: "Not found" }));

  return app;
}
