import type { AskFailure } from "@docqa/core";
import type { FastifyReply, FastifyRequest } from "fastify";
import { GenerationFailed, RagError, RetrievalFailed } from "../errors.js";

function statusFor(e: RagError): number {
  if (e.stage === "request") return 400;
  if ((e instanceof RetrievalFailed || e instanceof GenerationFailed) && e.timedOut) return 504;
  if (e.stage === "generation") return 502;
  if (e.stage === "retrieval") return 503;
  return 500;
}

/** Maps any failure to `{ ok: false, stage, error }` with a stage-specific status. */
export function sendFailure(req: FastifyRequest, reply: FastifyReply, e: unknown) {
  if (e instanceof RagError) {
    if (e.stage !== "request") req.log.error({ err: e, code: e.code }, `${e.stage} stage failed`);
    const body: AskFailure = { ok: false, stage: e.stage, error: e.message };
    return reply.code(statusFor(e)).send(body);
  }
  req.log.error({ err: e }, "unexpected failure");
  const body: AskFailure = { ok: false, stage: "request", error: "internal error" };
  return reply.code(500).send(body);
}
