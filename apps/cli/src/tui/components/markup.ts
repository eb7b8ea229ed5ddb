import { colors } from "../theme.js";

interface SegmentStyle {
  color?: string;
  bold?: boolean;
  inverse?: boolean;
}

/** Maps the classes in SudokuUI.renderBoard() output to terminal styles. */
const CLASS_STYLES: Record<string, SegmentStyle> = {
  "sudoku-clue": { color: colors.white, bold: true },
  "sudoku-player": { color: colors.cyan },
  "sudoku-valid": { color: colors.primary },
  "sudoku-error": { color: colors.error },
  "sudoku-cursor": { inverse: true },
};

export interface Segment extends SegmentStyle {
  text: string;
}

export function parseSegments(line: string): Segment[] {
  const segments: Segment[] = [];
  const regex = /<span class="([^"]*)">(.*?)<\/span>/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(line)) !== null) {
    if (match.index > lastIndex) {
      segments.push({ text: line.slice(lastIndex, match.index) });
    }

    const segment: Segment = { text: match[2] };
    for (const cls of match[1].split(/\s+/)) {
      const style = CLASS_STYLES[cls];
      if (!style) continue;
      if (style.color) segment.color = style.color;
      if (style.bold) segment.bold = true;
      if (style.inverse) segment.inverse = true;
    }

    segments.push(segment);
    lastIndex = match.index + match[0].length;
  }

  if (lastIndex < line.length) {
    segments.push({ text: line.slice(lastIndex) });
  }

  return segments;
}
