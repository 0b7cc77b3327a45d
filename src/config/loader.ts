import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export const ViewModeSchema = z.enum(['list', 'grouped']);

export const ConfigSchema = z.object({
  dataDir: z.string().min(1).optional(),
  fileName: z.string().min(1).default('tasks.md'),
  interactive: z
    .object({
      view: ViewModeSchema.optional(),
      colors: z
        .object({
          disable: z.boolean().optional(),
        })
        .optional(),
    })
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

function homeDir(): string {
  return process.env.HOME ?? process.env.USERPROFILE ?? '';
}

export function getConfigPath(): string {
  return path.join(homeDir(), '.config', 'todo', 'config.json');
}

export function getDefaultDataDir(): string {
  return path.join(homeDir(), '.local', 'share', 'todo');
}

export function expandHome(p: string): string {
  if (p === '~') return homeDir();
  if (p.startsWith('~/')) return path.join(homeDir(), p.slice(2));
  return p;
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    return ConfigSchema.parse({});
  }

  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${configPath}`);
    }
    throw error;
  }
}

export function resolveTaskFilePath(config: Config): string {
  const dir = config.dataDir ? expandHome(config.dataDir) : getDefaultDataDir();
  return path.join(dir, config.fileName);
}
