export interface ConfigData {
  /** Difficulty used when a command gets no --difficulty */
  difficulty: string;
  /** Time limit in seconds; empty means the difficulty's own limit */
  timeLimit: string;
  /** bunyan level: trace, debug, info, warn, error or fatal */
  logLevel: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "difficulty",
  "timeLimit",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  difficulty: "medium",
  timeLimit: "",
  logLevel: "warn",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  difficulty: "NINEGRID_DIFFICULTY",
  timeLimit: "NINEGRID_TIME_LIMIT",
  logLevel: "LOG_LEVEL",
};
