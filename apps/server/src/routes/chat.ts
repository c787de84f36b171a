// apps/server/src/routes/chat.ts
import type { AskResponse } from "@docqa/core";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { RagService } from "../lib/rag/service.js";
import { sendFailure } from "./reply.js";

const AskBody = z.object({
  question: z.string(),
  source: z.string().nullish(),
});

export async function registerChatRoutes(app: FastifyInstance, service: RagService) {
  app.post("/api/ask", async (req: FastifyRequest, reply: FastifyReply) => {
    const body = AskBody.safeParse(req.body ?? {});
    if (!body.success || !body.data.question.trim()) {
      return reply.code(400).send({ ok: false, stage: "request", error: "missing 'question'" });
    }

    try {
      const out = await service.ask(body.data.question, body.data.source ?? undefined);
      const res: AskResponse = { ok: true, ...out };
      return reply.send(res);
    } catch (e) {
      return sendFailure(req, reply, e);
    }
  });

  app.get("/api/history", async (_req, reply) => reply.send({ ok: true, messages: service.history() }));

  app.get("/api/stats", async (_req, reply) => reply.send({ ok: true, stats: service.stats() }));
}
