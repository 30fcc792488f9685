export interface ConfigData {
  /** Default search depth for `solve` */
  maxDepth: string;
  /** Default number of moves for `scramble` */
  scrambleLength: string;
  /** bunyan level: trace, debug, info, warn, error or fatal */
  logLevel: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "maxDepth",
  "scrambleLength",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  maxDepth: "8",
  scrambleLength: "10",
  logLevel: "warn",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  maxDepth: "POCKETSOLVE_MAX_DEPTH",
  scrambleLength: "POCKETSOLVE_SCRAMBLE_LENGTH",
  logLevel: "LOG_LEVEL",
};
