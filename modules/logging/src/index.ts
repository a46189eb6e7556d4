import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

export interface DebugLogOptions {
  enabled?: boolean;
  logDir?: string;
}

export interface ReadLogOptions {
  file?: string;
  maxLines?: number;
}

export interface DebugLogEntry {
  ts: number;
  level: 'debug';
  module: string;
  event: string;
  data: Record<string, unknown>;
}

const DEBUG_LOG_NAME = 'debug.jsonl';

let configured: DebugLogOptions = {};
let readyDir: string | null = null;

function defaultLogRoot(): string {
  return process.env.ECS_RELATIONSHIPS_LOG_DIR || path.join(os.homedir(), '.ecs-relationships', 'logs');
}

function isDebugEnabled(): boolean {
  if (configured.enabled !== undefined) return configured.enabled;
  return process.env.DEBUG === '1' || process.env.debug === '1';
}

/**
 * Override env-based settings. Fields left undefined fall back to the environment.
 */
export function configureDebugLog(options: DebugLogOptions): void {
  configured = { ...options };
  readyDir = null;
}

export function resolveDebugLogFile(): string {
  return path.join(configured.logDir ? path.resolve(configured.logDir) : defaultLogRoot(), DEBUG_LOG_NAME);
}

function ensureDebugLogDir(file: string): void {
  const dir = path.dirname(file);
  if (readyDir === dir) return;
  try {
    fs.mkdirSync(dir, { recursive: true });
    readyDir = dir;
  } catch {
    // ignore
  }
}

export function logDebug(module: string, event: string, data: Record<string, unknown> = {}): void {
  if (!isDebugEnabled()) return;
  const file = resolveDebugLogFile();
  ensureDebugLogDir(file);
  const entry: DebugLogEntry = {
    ts: Date.now(),
    level: 'debug',
    module,
    event,
    data,
  };
  try {
    fs.appendFileSync(file, `${JSON.stringify(entry)}\n`);
  } catch {
    // ignore
  }
}

export async function readDebugLog(options: ReadLogOptions = {}): Promise<DebugLogEntry[]> {
  const file = options.file ? path.resolve(options.file) : resolveDebugLogFile();
  const maxLines = options.maxLines ?? 200;
  const lines = await readTailLines(file, maxLines);
  return lines.map((line) => JSON.parse(line));
}

async function readTailLines(file: string, maxLines: number): Promise<string[]> {
  try {
    const content = await fs.promises.readFile(file, 'utf-8');
    const lines = content.split(/\r?\n/).filter((line) => line.length > 0);
    if (lines.length <= maxLines) {
      return lines;
    }
    return lines.slice(-maxLines);
  } catch (err: unknown) {
    if (isMissingFileError(err)) {
      return [];
    }
    throw err;
  }
}

function isMissingFileError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}
