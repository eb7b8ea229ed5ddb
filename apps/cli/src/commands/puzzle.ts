import { Command } from "commander";
import {
  generatePuzzle,
  parseGrid,
  gridToString,
  formatGrid,
  solve,
  countSolutions,
  countFilled,
} from "@sudokit/game-sudoku";
import { resolveConfig } from "../config/index.js";
import { configureLogger, getLogger } from "../logger.js";
import { errorMessage } from "../errors.js";

export interface CommandOutput {
  lines: string[];
  exitCode: number;
}

export interface GenerateCommandOptions {
  seed?: string;
  compact?: boolean;
}

export function runGenerate(opts: GenerateCommandOptions): CommandOutput {
  const start = Date.now();
  const { puzzle, solution, seed } = generatePuzzle({ seed: opts.seed });
  const clues = countFilled(puzzle);
  getLogger().debug({ seed, clues, ms: Date.now() - start }, "puzzle generated");

  if (opts.compact) {
    return { lines: [gridToString(puzzle), gridToString(solution)], exitCode: 0 };
  }

  return {
    lines: [
      `Seed: ${seed}`,
      "",
      `Puzzle (${clues} clues):`,
      formatGrid(puzzle),
      "",
      "Solution:",
      formatGrid(solution),
    ],
    exitCode: 0,
  };
}

const COUNT_LABELS = ["none", "unique", "multiple"] as const;

export function runSolve(text: string, opts: { count?: boolean }): CommandOutput {
  const grid = parseGrid(text);

  if (opts.count) {
    const n = countSolutions(grid, 2);
    return { lines: [COUNT_LABELS[n]], exitCode: n === 0 ? 1 : 0 };
  }

  const outcome = solve(grid);
  if (outcome.status === "unsolvable") {
    return { lines: ["No solution."], exitCode: 1 };
  }
  return { lines: [formatGrid(outcome.grid)], exitCode: 0 };
}

function report(output: CommandOutput): void {
  const text = output.lines.join("\n");
  if (output.exitCode === 0) {
    console.log(text);
  } else {
    console.error(text);
    process.exitCode = output.exitCode;
  }
}

function fail(err: unknown): void {
  getLogger().error({ err }, "command failed");
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
}

export function registerPuzzleCommands(program: Command): void {
  program
    .command("generate")
    .description("Print a new puzzle and its solution")
    .option("-s, --seed <seed>", "Seed to reproduce a puzzle")
    .option("--compact", "One 81-character line each for puzzle and solution")
    .action(async (opts: GenerateCommandOptions) => {
      try {
        configureLogger(await resolveConfig());
        report(runGenerate(opts));
      } catch (err: unknown) {
        fail(err);
      }
    });

  program
    .command("solve")
    .description("Solve a grid given as 81 characters (digits, 0 or . for empty)")
    .argument("<grid>", "Grid to solve")
    .option("--count", "Print whether the grid has none, a unique or multiple solutions")
    .action(async (grid: string, opts: { count?: boolean }) => {
      try {
        configureLogger(await resolveConfig());
        report(runSolve(grid, opts));
      } catch (err: unknown) {
        fail(err);
      }
    });
}
