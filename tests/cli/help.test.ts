import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';

describe('todo help output', () => {
  let errSpy: MockInstance<Parameters<typeof console.error>, ReturnType<typeof console.error>>;

  beforeEach(() => {
    vi.resetModules();
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errSpy.mockRestore();
  });

  function output(): string {
    return errSpy.mock.calls.map((c: unknown[]) => String(c[0] ?? '')).join('\n');
  }

  it('lists usage and the key bindings of both modes', async () => {
    const { printHelp } = await import('../../src/cli/help.js');
    printHelp();
    const out = output();
    expect(out).toContain('Usage: todo [options]');
    expect(out).toContain('Normal mode');
    expect(out).toContain('Insert mode');
    expect(out).toContain('Delete task');
    expect(out).toContain('~/.local/share/todo/tasks.md');
  });

  it('prints the message before the help text', async () => {
    const { printHelp } = await import('../../src/cli/help.js');
    printHelp("Unknown argument '--nope'. Run 'todo --help' for usage.");
    expect(errSpy.mock.calls[0]?.[0]).toBe("Unknown argument '--nope'. Run 'todo --help' for usage.");
    expect(errSpy.mock.calls[1]?.[0]).toBe('');
  });
});
