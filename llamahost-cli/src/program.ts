import { Command } from "commander";
import { createServiceClient, type FetchLike } from "./client.js";
import { registerKeyCommands } from "./commands/keys.js";
import { registerServiceCommands } from "./commands/service.js";
import { setQuiet } from "./output.js";

export const DEFAULT_URL = "http://localhost:1133";

export interface ProgramDeps {
  fetch?: FetchLike;
  env?: NodeJS.ProcessEnv;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const program = new Command();

  program
    .name("llamahost")
    .description("llamahost CLI - keys and operations for the inference service")
    .version("0.1.0")
    .option("-u, --url <url>", "Service URL (LLAMAHOST_URL)")
    .option("-k, --api-key <key>", "API key (LLAMAHOST_API_KEY)")
    .option("-q, --quiet", "Suppress informational output")
    .hook("preAction", (thisCommand) => {
      setQuiet(thisCommand.opts().quiet === true);
    });

  const getClient = () => {
    const opts = program.opts<{ url?: string; apiKey?: string }>();
    return createServiceClient({
      url: opts.url || env.LLAMAHOST_URL || DEFAULT_URL,
      apiKey: opts.apiKey || env.LLAMAHOST_API_KEY,
      fetch: deps.fetch,
    });
  };

  registerKeyCommands(program);
  registerServiceCommands(program, getClient);

  return program;
}

export { createServiceClient, parseSseData, errorMessage } from "./client.js";
export type { ApiResponse, ServiceClient, FetchLike } from "./client.js";
export { generateKeys } from "./commands/keys.js";
