import { ConfigData } from "./defaults";
import { resolveConfig } from "./resolve";

let current: ConfigData | undefined;

/** Resolve the layered config; the CLI's preAction hook calls this before every command */
export async function initConfig(): Promise<ConfigData> {
  current = await resolveConfig();
  return current;
}

export function getConfig(): ConfigData {
  if (current === undefined) {
    throw new Error("Config is not loaded yet. Call initConfig() before running a command.");
  }
  return current;
}
