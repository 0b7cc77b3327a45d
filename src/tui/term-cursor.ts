import type terminalKit from 'terminal-kit';

export type Term = typeof terminalKit.terminal;

export function setCursorVisible(term: Term, visible: boolean): void {
  // terminal-kit shows the cursor through hideCursor(false).
  term.hideCursor(!visible);
}
