import React, { useCallback, useState } from "react";
import { Box, useApp } from "ink";
import type { Outcome } from "@sudokit/core";
import { randomSeed } from "@sudokit/game-sudoku";
import { GameBoard } from "./screens/GameBoard.js";
import { GameOver } from "./screens/GameOver.js";
import { StatusBar } from "./components/StatusBar.js";

type Screen =
  | { type: "game"; seed: string }
  | { type: "solved"; seed: string; outcome: Outcome; elapsed: string };

interface AppProps {
  initialSeed?: string;
  feedback: boolean;
}

export function App({ initialSeed, feedback }: AppProps) {
  const { exit } = useApp();
  const [screen, setScreen] = useState<Screen>(() => ({
    type: "game",
    seed: initialSeed ?? randomSeed(),
  }));

  const newPuzzle = useCallback(() => setScreen({ type: "game", seed: randomSeed() }), []);

  return (
    <Box flexDirection="column">
      {screen.type === "game" && (
        <GameBoard
          key={screen.seed}
          seed={screen.seed}
          feedback={feedback}
          onSolved={(outcome, elapsed) =>
            setScreen({ type: "solved", seed: screen.seed, outcome, elapsed })
          }
          onNewPuzzle={newPuzzle}
          onQuit={exit}
        />
      )}

      {screen.type === "solved" && (
        <>
          <StatusBar seed={screen.seed} elapsed={screen.elapsed} />
          <GameOver
            outcome={screen.outcome}
            elapsed={screen.elapsed}
            onPlayAgain={newPuzzle}
            onQuit={exit}
          />
        </>
      )}
    </Box>
  );
}
