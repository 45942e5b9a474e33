import { Command } from "commander";
import { generateApiKey, keyFingerprint } from "@llamahost/auth";
import { detail, error, info, json } from "../output.js";

export interface GeneratedKey {
  key: string;
  tier: "standard" | "admin";
  fingerprint: string;
}

export function generateKeys(count: number, admin: boolean): GeneratedKey[] {
  const tier = admin ? "admin" : "standard";
  return Array.from({ length: count }, () => {
    const { key } = generateApiKey(admin ? "sk-admin" : "sk");
    return { key, tier, fingerprint: keyFingerprint(key) };
  });
}

export function registerKeyCommands(program: Command): void {
  const keys = program.command("keys").description("API key utilities");

  keys
    .command("generate")
    .description("Generate API keys for the API_KEYS / ADMIN_API_KEYS settings")
    .option("--admin", "Generate admin keys")
    .option("-n, --count <count>", "Number of keys", "1")
    .option("--json", "Print JSON")
    .action((opts: { admin?: boolean; count: string; json?: boolean }) => {
      const count = Number.parseInt(opts.count, 10);
      if (!Number.isInteger(count) || count < 1) {
        error(`Invalid count: ${opts.count}`);
        process.exitCode = 1;
        return;
      }

      const generated = generateKeys(count, opts.admin === true);
      if (opts.json) {
        json(generated);
        return;
      }

      for (const entry of generated) {
        detail(entry.fingerprint, entry.key);
      }
      const variable = opts.admin ? "ADMIN_API_KEYS" : "API_KEYS";
      info(`${variable}=${generated.map((entry) => entry.key).join(",")}`);
    });
}
