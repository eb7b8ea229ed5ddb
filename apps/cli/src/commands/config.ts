import { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  getConfigPath,
  getSource,
  isConfigKey,
  checkConfigValue,
  CONFIG_KEYS,
} from "../config/index.js";

function unknownKey(key: string): string {
  return `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`;
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.sudokit/config.json)");

  configCmd.action(async () => {
    console.log(await formatConfigList());
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isConfigKey(key)) {
        console.error(unknownKey(key));
        process.exitCode = 1;
        return;
      }
      const problem = checkConfigValue(key, value);
      if (problem) {
        console.error(problem);
        process.exitCode = 1;
        return;
      }
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isConfigKey(key)) {
        console.error(unknownKey(key));
        process.exitCode = 1;
        return;
      }
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      console.log(await formatConfigList());
    });
}

export async function formatConfigList(): Promise<string> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  const lines = [`Config file: ${getConfigPath()}`, "──────────────────────────────────────"];
  for (const key of CONFIG_KEYS) {
    const value = resolved[key] === "" ? "(not set)" : resolved[key];
    lines.push(`  ${key}: ${value}  (${getSource(key, fileData)})`);
  }
  return lines.join("\n");
}
