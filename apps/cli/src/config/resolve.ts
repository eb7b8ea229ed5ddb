import { type ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS, checkConfigValue } from "./defaults.js";
import { readConfigFile } from "./configFile.js";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(key: K, value: ConfigData[K]): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) {
    delete cliOverrides[key];
  }
}

/** A layer's value for `key`, or undefined when unset or rejected */
function acceptValue(key: keyof ConfigData, value: string | undefined, source: string): string | undefined {
  if (value === undefined || value === "") return undefined;
  const problem = checkConfigValue(key, value);
  if (problem) {
    console.error(`Warning: ${source} was ignored. ${problem}`);
    return undefined;
  }
  return value;
}

/** defaults < config file < environment < command-line flags */
export async function resolveConfig(): Promise<ConfigData> {
  const fileConfig = await readConfigFile();
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const layers = [
      acceptValue(key, fileConfig[key], `${key} in the config file`),
      acceptValue(key, process.env[ENV_MAP[key]], ENV_MAP[key]),
      acceptValue(key, cliOverrides[key], `--${key === "logLevel" ? "log-level" : key}`),
    ];
    for (const value of layers) {
      if (value !== undefined) resolved[key] = value;
    }
  }

  return resolved;
}

/** Where the resolved value of `key` came from */
export function getSource(key: keyof ConfigData, fileData: Partial<ConfigData>): string {
  const cliVal = cliOverrides[key];
  if (cliVal !== undefined && cliVal !== "") return "flag";
  const envVal = process.env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  const fileVal = fileData[key];
  if (fileVal !== undefined && fileVal !== "") return "config file";
  return "default";
}
