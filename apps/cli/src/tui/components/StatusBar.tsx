import React from "react";
import { Box, Text } from "ink";
import { colors } from "../theme.js";

interface StatusBarProps {
  seed?: string;
  elapsed?: string;
}

export function StatusBar({ seed, elapsed }: StatusBarProps) {
  return (
    <Box
      borderStyle="single"
      borderColor={colors.border}
      paddingX={1}
      flexDirection="row"
      justifyContent="space-between"
    >
      <Text color={colors.primary} bold>
        SUDOKIT v0.1.0
      </Text>
      <Text color={colors.dimmed}>
        {seed ? `seed ${seed}` : "no puzzle"}
        {elapsed ? ` | ${elapsed}` : ""}
      </Text>
    </Box>
  );
}
