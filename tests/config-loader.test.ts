import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { getConfigPath, loadConfig, resolveTaskFilePath } from '../src/config/loader.js';

let tempDir: string;
let originalHome: string | undefined;

beforeEach(() => {
  originalHome = process.env.HOME;
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'todo-config-'));
  process.env.HOME = tempDir;
});

afterEach(() => {
  process.env.HOME = originalHome;
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeConfig(content: string): void {
  const dir = path.join(tempDir, '.config', 'todo');
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, 'config.json'), content, 'utf-8');
}

describe('config loader', () => {
  it('reads the config from the home directory', () => {
    expect(getConfigPath()).toBe(path.join(tempDir, '.config', 'todo', 'config.json'));
  });

  it('falls back to defaults when no config file exists', () => {
    const config = loadConfig();
    expect(config).toEqual({ fileName: 'tasks.md' });
    expect(resolveTaskFilePath(config)).toBe(path.join(tempDir, '.local', 'share', 'todo', 'tasks.md'));
  });

  it('expands ~ in dataDir', () => {
    writeConfig(JSON.stringify({ dataDir: '~/notes', fileName: 'todo.md' }));
    const config = loadConfig();
    expect(resolveTaskFilePath(config)).toBe(path.join(tempDir, 'notes', 'todo.md'));
  });

  it('keeps absolute data directories as they are', () => {
    writeConfig(JSON.stringify({ dataDir: '/srv/todo' }));
    expect(resolveTaskFilePath(loadConfig())).toBe(path.join('/srv/todo', 'tasks.md'));
  });

  it('accepts interactive settings', () => {
    writeConfig(JSON.stringify({ interactive: { view: 'grouped', colors: { disable: true } } }));
    const config = loadConfig();
    expect(config.interactive?.view).toBe('grouped');
    expect(config.interactive?.colors?.disable).toBe(true);
  });

  it('rejects invalid JSON', () => {
    writeConfig('{ not json');
    expect(() => loadConfig()).toThrow(`Invalid JSON in config file: ${getConfigPath()}`);
  });

  it('rejects values of the wrong type', () => {
    writeConfig(JSON.stringify({ interactive: { view: 'kanban' } }));
    expect(() => loadConfig()).toThrow();
  });

  it('loads an explicit path', () => {
    const explicit = path.join(tempDir, 'custom.json');
    fs.writeFileSync(explicit, JSON.stringify({ fileName: 'other.md' }), 'utf-8');
    expect(loadConfig(explicit).fileName).toBe('other.md');
  });
});
