import fs from "node:fs";
import os from "node:os";
import path from "node:path";

// Runs before any test module loads config: nothing below may come from a developer's .env.
const noDotenv = path.join(os.tmpdir(), "narrator-vitest-empty.env");
if (!fs.existsSync(noDotenv)) fs.writeFileSync(noDotenv, "", "utf8");
process.env.DOTENV_CONFIG_PATH = noDotenv;

for (const key of ["LOG_SCOPES", "LOG_FORMAT", "OPENAI_API_KEY", "GAME_INVENTORY_CAPACITY"]) {
  delete process.env[key];
}

process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "error";
process.env.DATA_ROOT = path.join(os.tmpdir(), "narrator-vitest-data");
process.env.PRINT_CONFIG = "false";
