/**
 * llamahost Inference Service
 *
 * Serves one local GGUF model through node-llama-cpp behind an
 * OpenAI-compatible API. The model is loaded before the server listens;
 * invalid configuration or a failed first load exits with code 1.
 */

import { setLogLevel, createLogger } from "@llamahost/http";
import { ConfigError, loadConfig, type Config } from "./config.js";
import { createLlamaBackend } from "./llama/engine.js";
import { createInferenceServer } from "./app.js";
import { describeError } from "./errors.js";

const logger = createLogger("inference");

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  setLogLevel(config.logLevel);

  const service = createInferenceServer(config, {
    backend: createLlamaBackend(),
    shutdown: { preShutdownDelayMs: config.nodeEnv === "production" ? 5000 : 0 },
  });

  logger.info(`Loading ${config.modelName} from ${config.model.modelPath}...`);
  try {
    await service.loadModel();
  } catch (err) {
    logger.error("Failed to load model at startup", err);
    process.exit(1);
  }

  await service.start();
  logger.info(`Serving ${config.modelName} (${config.chatTemplate} template, ${config.maxConcurrentGenerations} generation slot(s))`);
}

main().catch((err: unknown) => {
  logger.error(`Fatal: ${describeError(err)}`);
  process.exit(1);
});
