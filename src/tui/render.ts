import type { Frame, Segment, SegmentStyle } from './frame.js';
import { textWidth, truncateByWidth } from './layout.js';
import { setCursorVisible, type Term } from './term-cursor.js';

type Writer = (s: string) => void;

function stylesFor(term: Term, colorsDisabled: boolean): Record<SegmentStyle, Writer> {
  const plain: Writer = (s) => {
    term(s);
  };
  const styled = (write: Writer): Writer => (colorsDisabled ? plain : write);
  return {
    text: plain,
    bold: styled((s) => term.bold(s)),
    dim: styled((s) => term.dim(s)),
    inverse: styled((s) => term.inverse(s)),
    yellow: styled((s) => term.yellow(s)),
    green: styled((s) => term.green(s)),
    red: styled((s) => term.red(s)),
    field: styled((s) => term.underline(s)),
    // The insertion point stays visible without colours.
    fieldCursor: (s) => term.inverse(s),
  };
}

function writeSegments(styles: Record<SegmentStyle, Writer>, segments: Segment[], maxWidth: number): number {
  let remaining = maxWidth;
  for (const segment of segments) {
    if (remaining <= 0) break;
    if (!segment.text) continue;
    const shown = truncateByWidth(segment.text, remaining);
    styles[segment.style](shown);
    remaining -= textWidth(shown);
  }
  return remaining;
}

/** Paint a frame over the whole screen and place (or hide) the cursor. */
export function paintFrame(term: Term, frame: Frame, options: { colorsDisabled: boolean }): void {
  const styles = stylesFor(term, options.colorsDisabled);

  setCursorVisible(term, false);
  term.clear();

  frame.lines.forEach((frameLine, i) => {
    term.moveTo(1, i + 1);
    term.styleReset();
    // Leave the bottom-right cell empty so the terminal does not scroll.
    const lineWidth = i === frame.height - 1 ? Math.max(0, frame.width - 1) : frame.width;
    const remaining = writeSegments(styles, frameLine.segments, lineWidth);
    if (remaining > 0) styles[frameLine.fill](' '.repeat(remaining));
    term.styleReset();
  });

  if (frame.cursor) {
    term.moveTo(frame.cursor.x, frame.cursor.y);
    setCursorVisible(term, true);
  }
}
