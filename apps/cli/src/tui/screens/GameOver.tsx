import React from "react";
import { Box, Text, useInput } from "ink";
import type { Outcome } from "@sudokit/core";
import { colors } from "../theme.js";

interface GameOverProps {
  outcome: Outcome;
  elapsed: string;
  onPlayAgain: () => void;
  onQuit: () => void;
}

export function GameOver({ outcome, elapsed, onPlayAgain, onQuit }: GameOverProps) {
  useInput((input) => {
    const key = input.toLowerCase();
    if (key === "y") onPlayAgain();
    if (key === "n" || key === "q") onQuit();
  });

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1} alignItems="center">
      <Text color={colors.primary} bold>
        {"═══════════════════"}
      </Text>
      <Text color={colors.primary} bold>
        {"     SOLVED!     "}
      </Text>
      <Text color={colors.primary} bold>
        {"═══════════════════"}
      </Text>

      <Text>{""}</Text>

      <Text color={colors.white}>Time: {elapsed}</Text>
      <Text color={colors.dimmed}>Reason: {outcome.reason}</Text>

      <Text>{""}</Text>
      <Text color={colors.secondary} bold>
        Play again? [Y] yes  [N] quit
      </Text>
    </Box>
  );
}
