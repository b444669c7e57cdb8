import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { buildServer } from "./app";
import { loadEvaluatorConfig } from "./config";

function loadDotEnvFile(fp: string): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (process.env[key] == null) process.env[key] = val;
  }
}

function loadEnv(): void {
  // Repo root .env first, then app-local .env.
  const here = path.dirname(fileURLToPath(import.meta.url));
  loadDotEnvFile(path.resolve(here, "..", "..", "..", ".env"));
  loadDotEnvFile(path.resolve(here, "..", ".env"));
}

loadEnv();

const config = loadEvaluatorConfig();
const app = buildServer({ config });

async function main(): Promise<void> {
  await app.listen({ port: config.service.port, host: config.service.host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
