import bunyan from "bunyan";

const LEVELS: readonly bunyan.LogLevelString[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export function parseLogLevel(value: string | undefined): bunyan.LogLevelString {
  return LEVELS.find((level) => level === value?.toLowerCase()) ?? "warn";
}

// stderr keeps command output on stdout clean
const log = bunyan.createLogger({
  name: "pocketsolve",
  level: parseLogLevel(process.env.LOG_LEVEL),
  stream: process.stderr,
});

export default log;
