import React from "react";
import { Box, Text } from "ink";
import { parseSegments } from "./markup.js";

/**
 * Renders board markup (with <span class="..."> tags) as coloured Ink text.
 * Content without spans is drawn plain.
 */
export function ColoredBoard({ html }: { html: string }) {
  const lines = html.split("\n");

  return (
    <Box flexDirection="column">
      {lines.map((line, i) => (
        <Text key={i}>
          {parseSegments(line).map((seg, j) => (
            <Text key={j} color={seg.color} bold={seg.bold} inverse={seg.inverse}>
              {seg.text}
            </Text>
          ))}
        </Text>
      ))}
    </Box>
  );
}
