import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import React from "react";
import { render } from "ink";
import { App } from "./tui/App.js";
import { resolveConfig, setCliOverride } from "./config/index.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerPuzzleCommands } from "./commands/puzzle.js";
import { closeLogger, configureLogger, getLogger } from "./logger.js";
import { errorMessage } from "./errors.js";

program
  .name("sudokit")
  .description("Sudoku in the terminal")
  .version("0.1.0", "-v, --version")
  .option("--log-level <level>", "Override the configured log level");

program.hook("preAction", () => {
  const logLevel: unknown = program.opts().logLevel;
  if (typeof logLevel === "string") {
    setCliOverride("logLevel", logLevel);
  }
});

registerConfigCommand(program);
registerPuzzleCommands(program);

program
  .command("play", { isDefault: true })
  .description("Play an interactive puzzle")
  .option("-s, --seed <seed>", "Seed for the first puzzle")
  .option("--no-feedback", "Do not colour entries that break a rule")
  .action(async (opts: { seed?: string; feedback: boolean }) => {
    try {
      const config = await resolveConfig();
      configureLogger(config);
      const feedback = opts.feedback && config.feedback !== "off";
      const { waitUntilExit } = render(React.createElement(App, { initialSeed: opts.seed, feedback }));
      await waitUntilExit();
    } catch (err: unknown) {
      getLogger().error({ err }, "play failed");
      console.error(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });

await program.parseAsync();
await closeLogger();
