/**
 * Slipway Runtime Host — StateIO
 *
 * Project-scoped persistence for the layer cache index (JSON under
 * `state/`) and the build event log (JSONL under `logs/`).
 *
 *   FileStateIO   — durable files under `<home>/projects/<id>/`
 *   MemoryStateIO — in-memory, for tests
 *
 * Each build context gets its own StateIO, so two projects never share a
 * cache index or a log.
 */

import { appendFileSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

export interface StateIO {
  /**
   * Read and parse a JSON state file. Returns `fallback` when the file is
   * absent or is not valid JSON; the caller validates the shape.
   */
  readJson(filename: string, fallback: unknown): unknown;

  /** Replace a JSON state file. The write is atomic. */
  writeJson(filename: string, value: unknown): void;

  /** Append one line (newline added) to a log file. */
  appendLine(logfilename: string, line: string): void;

  /** Raw log contents, or '' when the log does not exist yet. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

export class FileStateIO implements StateIO {
  constructor(private readonly projectDir: string) {}

  readJson(filename: string, fallback: unknown): unknown {
    try {
      return JSON.parse(readFileSync(join(this.projectDir, 'state', filename), 'utf-8'));
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) return fallback;
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const dir = join(this.projectDir, 'state');
    mkdirSync(dir, { recursive: true });
    const target = join(dir, filename);
    // Write then rename so a crash never leaves a truncated index behind.
    const temp = `${target}.${process.pid}.tmp`;
    writeFileSync(temp, JSON.stringify(value, null, 2) + '\n', 'utf-8');
    renameSync(temp, target);
  }

  appendLine(logfilename: string, line: string): void {
    const dir = join(this.projectDir, 'logs');
    mkdirSync(dir, { recursive: true });
    appendFileSync(join(dir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.projectDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return '';
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * Values round-trip through JSON so tests see what FileStateIO would
 * persist (undefined dropped, Dates as strings).
 */
export class MemoryStateIO implements StateIO {
  private readonly files = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson(filename: string, fallback: unknown): unknown {
    const raw = this.files.get(filename);
    return raw === undefined ? fallback : JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    this.files.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended so far. Test helper; not part of StateIO. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.map((l) => l + '\n').join('');
  }
}

export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
