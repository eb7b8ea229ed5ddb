import React, { useCallback, useEffect, useState } from "react";
import { Box, Text, useInput } from "ink";
import Spinner from "ink-spinner";
import { type Action, type Outcome, formatElapsed } from "@sudokit/core";
import { SessionOrchestrator } from "@sudokit/engine";
import {
  SudokuModule,
  SudokuUI,
  type SudokuData,
  type SudokuPublicData,
  type SudokuView,
  type CellRef,
} from "@sudokit/game-sudoku";
import { colors } from "../theme.js";
import { ColoredBoard } from "../components/ColoredBoard.js";
import { StatusBar } from "../components/StatusBar.js";
import { directionFor, moveCursor } from "../cursor.js";
import { getLogger } from "../../logger.js";
import { errorMessage } from "../../errors.js";

const PLAYER = "player";

type Session = SessionOrchestrator<SudokuData, SudokuPublicData>;
type InputMode = "board" | "command";

interface GameBoardProps {
  seed: string;
  feedback: boolean;
  onSolved: (outcome: Outcome, elapsed: string) => void;
  onNewPuzzle: () => void;
  onQuit: () => void;
}

export function GameBoard({ seed, feedback, onSolved, onNewPuzzle, onQuit }: GameBoardProps) {
  const [session, setSession] = useState<Session | null>(null);
  const [publicData, setPublicData] = useState<SudokuPublicData | null>(null);
  const [cursor, setCursor] = useState<CellRef>({ row: 0, col: 0 });
  const [error, setError] = useState("");
  const [inputMode, setInputMode] = useState<InputMode>("board");
  const [inputBuffer, setInputBuffer] = useState("");
  const [now, setNow] = useState(() => Date.now());
  const [stoppedAt, setStoppedAt] = useState<number | null>(null);

  // Generation is synchronous: start it on the next tick so the spinner paints first
  useEffect(() => {
    const timer = setTimeout(() => {
      const log = getLogger();
      const start = Date.now();
      try {
        const next: Session = new SessionOrchestrator({
          game: SudokuModule,
          players: [PLAYER],
          rngSeed: seed,
        });
        log.debug({ seed, ms: Date.now() - start }, "puzzle generated");
        setSession(next);
        setPublicData(next.getObservation(PLAYER).publicData);
      } catch (err: unknown) {
        log.error({ err, seed }, "puzzle generation failed");
        setError(errorMessage(err));
      }
    }, 0);
    return () => clearTimeout(timer);
  }, [seed]);

  useEffect(() => {
    if (!session || stoppedAt !== null) return;
    const interval = setInterval(() => setNow(Date.now()), 1000);
    return () => clearInterval(interval);
  }, [session, stoppedAt]);

  const view: SudokuView | null = publicData ? { ...publicData, cursor, feedback } : null;

  const submit = useCallback(
    (action: Action | null) => {
      if (!session) return;
      if (!action) {
        setError("Invalid input. " + SudokuUI.inputHint);
        return;
      }
      try {
        const result = session.submitAction(PLAYER, action);
        getLogger().debug({ seed, action: SudokuUI.formatAction(action) }, "action applied");
        setPublicData(result.observation.publicData);
        setError("");
        if (result.terminal && result.outcome) {
          const end = Date.now();
          setStoppedAt(end);
          if (result.outcome.reason === "puzzle_solved") {
            onSolved(result.outcome, formatElapsed(session.startedAt, end));
          }
        }
      } catch (err: unknown) {
        setError(errorMessage(err));
      }
    },
    [session, seed, onSolved]
  );

  useInput((input, key) => {
    if (inputMode === "command") {
      if (key.return) {
        if (view) submit(SudokuUI.parseInput(inputBuffer, view));
        setInputBuffer("");
        setInputMode("board");
      } else if (key.escape) {
        setInputBuffer("");
        setInputMode("board");
      } else if (key.backspace || key.delete) {
        setInputBuffer((prev) => prev.slice(0, -1));
      } else if (input && !key.ctrl && !key.meta) {
        setInputBuffer((prev) => prev + input);
      }
      return;
    }

    if (input === "q") {
      onQuit();
      return;
    }
    if (input === "n") {
      onNewPuzzle();
      return;
    }
    if (!view) return;

    const direction = directionFor(input, key);
    if (direction) {
      setCursor((prev) => moveCursor(prev, direction));
      return;
    }

    if (input === ":") {
      setError("");
      setInputMode("command");
    } else if (/^[0-9]$/.test(input)) {
      submit(SudokuUI.parseInput(input, view));
    } else if (key.backspace || key.delete) {
      submit(SudokuUI.parseInput("0", view));
    } else if (input === "c") {
      submit(SudokuUI.parseInput("reset", view));
    } else if (input === "s") {
      submit(SudokuUI.parseInput("solve", view));
    } else if (key.escape) {
      setError("");
    }
  });

  if (!session || !view) {
    return (
      <Box flexDirection="column">
        <StatusBar seed={seed} />
        <Box paddingX={2} paddingY={1}>
          {error ? (
            <Text color={colors.error}>Error: {error}</Text>
          ) : (
            <>
              <Text color={colors.secondary}>
                <Spinner type="dots" />
              </Text>
              <Text color={colors.white}> Generating puzzle...</Text>
            </>
          )}
        </Box>
      </Box>
    );
  }

  const statusStr = SudokuUI.renderStatus(view);

  return (
    <Box flexDirection="column">
      <StatusBar seed={seed} elapsed={formatElapsed(session.startedAt, stoppedAt ?? now)} />
      <Box flexDirection="column" paddingX={2} paddingY={1}>
        <ColoredBoard html={SudokuUI.renderBoard(view)} />

        {statusStr && (
          <Text color={colors.warning} bold>
            {statusStr}
          </Text>
        )}

        <Text>{""}</Text>

        {error && <Text color={colors.error}>{error}</Text>}

        {inputMode === "command" ? (
          <Box>
            <Text color={colors.secondary}>{": "}</Text>
            <Text color={colors.text}>{inputBuffer}</Text>
            <Text color={colors.dimmed}>{"_"}</Text>
          </Box>
        ) : (
          <Text color={colors.dimmed}>
            [arrows/hjkl] move  [1-9] enter  [0] erase  [c] clear all  [n] new  [s] solve  [:] command  [q] quit
          </Text>
        )}
      </Box>
    </Box>
  );
}
