import terminalKit from 'terminal-kit';

/** Title line plus one blank line. */
export const HEADER_HEIGHT = 2;
/** Separator, message/prompt line, shortcut bar. */
export const FOOTER_HEIGHT = 3;

export const COMPACT_SHORTCUTS_BELOW = 80;

export function getListHeight(terminalHeight: number): number {
  return Math.max(0, terminalHeight - HEADER_HEIGHT - FOOTER_HEIGHT);
}

/**
 * Clamp `scroll` to the rows that exist, then move it just enough to keep
 * `row` on screen. A negative `row` (nothing selected) only clamps.
 */
export function scrollToShow(row: number, scroll: number, listHeight: number, rowCount: number): number {
  if (listHeight <= 0) return 0;
  let next = Math.min(Math.max(0, scroll), Math.max(0, rowCount - listHeight));
  if (row < 0) return next;
  if (row < next) {
    next = row;
  } else if (row >= next + listHeight) {
    next = row - listHeight + 1;
  }
  return next;
}

export function textWidth(s: string): number {
  return terminalKit.stringWidth(s);
}

export function truncateByWidth(s: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (textWidth(s) <= maxWidth) return s;
  return terminalKit.truncateString(s, maxWidth);
}

/** Like `truncateByWidth`, but marks the cut with `…`. */
export function ellipsize(s: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (textWidth(s) <= maxWidth) return s;
  if (maxWidth === 1) return '…';
  return truncateByWidth(s, maxWidth - 1) + '…';
}

export function joinShortcuts(chunks: readonly string[], width: number): string {
  if (width <= 0) return '';
  const sep = '  ';
  let out = '';
  let used = 0;

  for (const chunk of chunks) {
    const next = out ? `${out}${sep}${chunk}` : chunk;
    if (textWidth(next) > width) break;
    out = next;
    used++;
  }

  if (!out) {
    return truncateByWidth(chunks[0] ?? '', width);
  }

  if (used < chunks.length) {
    const dots = `${sep}…`;
    if (textWidth(out + dots) <= width) out += dots;
    else if (textWidth(out + '…') <= width) out += '…';
  }

  return truncateByWidth(out, width);
}
