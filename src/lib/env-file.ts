import * as fs from "node:fs";

/**
 * Load environment variables from a .env file.
 * Only sets variables that are not already defined in process.env.
 * Returns the number of variables applied.
 */
export function loadEnvFile(filePath: string, env: NodeJS.ProcessEnv = process.env): number {
  if (!fs.existsSync(filePath)) return 0;
  const raw = fs.readFileSync(filePath, "utf-8");
  let applied = 0;
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;
    const key = trimmed.slice(0, eq).trim();
    let value = trimmed.slice(eq + 1).trim();
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    if (!Object.prototype.hasOwnProperty.call(env, key)) {
      env[key] = value;
      applied++;
    }
  }
  return applied;
}
