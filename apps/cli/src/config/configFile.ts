import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { ConfigData, CONFIG_KEYS } from "./defaults";

/** POCKETSOLVE_CONFIG_DIR moves the config directory, e.g. for tests */
export function getConfigDir(): string {
  return process.env.POCKETSOLVE_CONFIG_DIR || join(homedir(), ".pocketsolve");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/** Keep only known keys with string values */
function pickConfig(parsed: Record<string, unknown>): Partial<ConfigData> {
  const result: Partial<ConfigData> = {};
  for (const key of CONFIG_KEYS) {
    const value = parsed[key];
    if (typeof value === "string") {
      result[key] = value;
    } else if (typeof value === "number") {
      result[key] = String(value);
    }
  }
  return result;
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  const path = getConfigPath();
  try {
    const raw = await readFile(path, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? pickConfig(parsed) : {};
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return {};
    }
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "pocketsolve config set <key> <value>" to recreate it.`,
      );
      return {};
    }
    throw err;
  }
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}
