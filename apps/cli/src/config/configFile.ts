import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { type ConfigData, CONFIG_KEYS } from "./defaults.js";

/** `SUDOKIT_HOME` relocates the config directory (default ~/.sudokit) */
export function getConfigDir(): string {
  const home = process.env.SUDOKIT_HOME;
  return home ? home : join(homedir(), ".sudokit");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function pickConfig(parsed: unknown): Partial<ConfigData> {
  const data: Partial<ConfigData> = {};
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return data;
  }
  for (const key of CONFIG_KEYS) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === "string") data[key] = value;
  }
  return data;
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  const configPath = getConfigPath();
  try {
    const raw = await readFile(configPath, "utf-8");
    return pickConfig(JSON.parse(raw));
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      return {};
    }
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${configPath} is malformed and was ignored. ` +
          `Run "sudokit config set <key> <value>" to recreate it.`,
      );
      return {};
    }
    throw err;
  }
}

export async function writeConfigFile(data: Partial<ConfigData>): Promise<void> {
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
