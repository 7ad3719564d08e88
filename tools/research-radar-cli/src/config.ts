import { ConfigError, DEFAULT_CONFIG_PATH, loadSettings, Settings } from "@/lib/config-loader";
import { CliError } from "./errors";

export interface RuntimeOptionInput {
  config?: string;
  json?: boolean;
}

function normalizeString(value: unknown): string {
  return String(value ?? "").trim();
}

export function parseBoundedInt(label: string, value: unknown, min: number, max: number): number {
  const text = normalizeString(value);
  const parsed = Number.parseInt(text, 10);
  if (!Number.isFinite(parsed)) {
    throw new CliError(1, `${label} is not a valid integer: ${text}`);
  }
  if (parsed < min || parsed > max) {
    throw new CliError(1, `${label} must be within ${min}-${max}: ${parsed}`);
  }
  return parsed;
}

export function resolveConfigPath(options: RuntimeOptionInput): string {
  return normalizeString(options.config) || normalizeString(process.env.RADAR_CONFIG) || DEFAULT_CONFIG_PATH;
}

export function resolveSettings(options: RuntimeOptionInput): Settings {
  const configPath = resolveConfigPath(options);
  try {
    return loadSettings(configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new CliError(2, error.message, { hint: `Check ${configPath}` });
    }
    throw error;
  }
}
