export interface ConfigData {
  /** bunyan level name */
  logLevel: string;
  /** Write log records to this file instead of stderr */
  logFile: string;
  /** "on" colours entries by whether they break a rule */
  feedback: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = ["logLevel", "logFile", "feedback"];

export const DEFAULTS: ConfigData = {
  logLevel: "warn",
  logFile: "",
  feedback: "on",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  logLevel: "LOG_LEVEL",
  logFile: "SUDOKIT_LOG_FILE",
  feedback: "SUDOKIT_FEEDBACK",
};

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export function isConfigKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}

/**
 * Returns an error message when `value` is not acceptable for `key`,
 * or null when it is.
 */
export function checkConfigValue(key: keyof ConfigData, value: string): string | null {
  switch (key) {
    case "logLevel":
      return LOG_LEVELS.some((l) => l === value)
        ? null
        : `Invalid logLevel: "${value}". Use one of ${LOG_LEVELS.join(", ")}`;
    case "feedback":
      return value === "on" || value === "off"
        ? null
        : `Invalid feedback: "${value}". Use on or off`;
    case "logFile":
      return null;
  }
}
