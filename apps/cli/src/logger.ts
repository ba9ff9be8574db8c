import bunyan from "bunyan";

export const LOG_LEVELS: bunyan.LogLevelString[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export function isLogLevel(value: string): value is bunyan.LogLevelString {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL ?? "";

// stdout belongs to the game, so logs go to stderr
const log = bunyan.createLogger({
  name: "ninegrid",
  level: isLogLevel(envLevel) ? envLevel : "warn",
  stream: process.stderr,
});

export default log;
