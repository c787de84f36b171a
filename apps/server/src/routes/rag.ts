// apps/server/src/routes/rag.ts
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { RagService } from "../lib/rag/service.js";
import { sendFailure } from "./reply.js";

export async function registerRagRoutes(app: FastifyInstance, service: RagService) {
  app.get("/api/documents", async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      return reply.send({ ok: true, documents: await service.listDocuments() });
    } catch (e) {
      return sendFailure(req, reply, e);
    }
  });

  // on-demand re-ingestion; queued behind any question in flight
  app.post("/api/reindex", async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      const report = await service.reindex();
      return reply.send({ ok: true, indexed: report.indexed, skipped: report.skipped });
    } catch (e) {
      return sendFailure(req, reply, e);
    }
  });
}
