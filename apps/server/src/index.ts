// apps/server/src/index.ts
import { buildApp } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";
import { errorMessage, RagError } from "./errors.js";
import { AnthropicGenerator } from "./lib/anthropic.js";
import { OllamaEmbedder } from "./lib/ollama.js";
import { RagService } from "./lib/rag/index.js";
import { createLogger } from "./logger.js";

// ──────────────────────────────────────────────────────────────
// Config
// ──────────────────────────────────────────────────────────────
const logger = createLogger(process.env.LOG_LEVEL);

function fatal(stage: string, e: unknown): never {
  logger.fatal({ err: e, stage }, `${stage} failed: ${errorMessage(e)}`);
  process.exit(1);
}

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (e) {
    fatal(e instanceof RagError ? e.stage : "configuration", e);
  }
}

const config = readConfig();

// ──────────────────────────────────────────────────────────────
// Service bootstrap (index load-or-build happens once, here)
// ──────────────────────────────────────────────────────────────
const service = new RagService({
  config,
  logger,
  embedder: new OllamaEmbedder({ baseUrl: config.ollamaUrl, model: config.embedModel }),
  generator: new AnthropicGenerator({
    baseUrl: config.anthropicUrl,
    apiKey: config.anthropicApiKey,
    model: config.genModel,
    maxTokens: config.genMaxTokens,
  }),
});

try {
  await service.init();
} catch (e) {
  fatal(e instanceof RagError ? e.stage : "index", e);
}

const app = await buildApp({ service, logger });

async function shutdown(signal: string) {
  app.log.info({ signal }, "shutting down");
  await app.close();
  await service.close();
  process.exit(0);
}
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((e) => fatal("shutdown", e));
  });
}

app
  .listen({ port: config.port, host: config.host })
  .then(() => app.log.info(`Server listening on http://${config.host}:${config.port}`))
  .catch((err) => {
    app.log.error(err);
    process.exit(1);
  });
