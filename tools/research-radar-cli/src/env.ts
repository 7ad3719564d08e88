import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";

function candidateEnvFiles(): string[] {
  const cwd = process.cwd();
  return Array.from(new Set([resolve(cwd, ".env"), resolve(cwd, "../.env"), resolve(cwd, "../../.env")]));
}

/** Loads the nearest `.env` files without overriding variables already set. */
export function bootstrapEnvFromDotenv(): void {
  for (const filePath of candidateEnvFiles()) {
    if (!existsSync(filePath)) {
      continue;
    }
    loadDotenv({
      path: filePath,
      override: false,
    });
  }
}
