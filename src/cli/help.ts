import { boldText, dimText } from './terminal.js';
import { NORMAL_HELP_ENTRIES, INSERT_HELP_ENTRIES } from '../tui/keymap.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const lines = [
    `${boldText('todo')}: ${dimText('a vim-style task list for the terminal')}`,
    '',
    'Usage: todo [options]',
    '',
    'Opens the full-screen task list. Changes are saved after every edit and on quit.',
    '',
    formatSection('Options', [
      ['-h, --help', 'Show this help'],
      ['-v, --version', 'Show version'],
    ]),
    '',
    formatSection('Normal mode', NORMAL_HELP_ENTRIES),
    '',
    formatSection('Insert mode', INSERT_HELP_ENTRIES),
    '',
    formatSection('Files', [
      ['Tasks', '~/.local/share/todo/tasks.md (one "- [ ] text" line per task)'],
      ['Config', '~/.config/todo/config.json (dataDir, fileName, interactive.view, interactive.colors.disable)'],
    ]),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: readonly (readonly [string, string])[]): string {
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => `  ${boldText(name.padEnd(maxLen))}  ${dimText(desc)}`);
  return [boldText(title), ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
