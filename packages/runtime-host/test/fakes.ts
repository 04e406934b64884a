/**
 * Shared test doubles for runtime-host tests.
 *
 * ScriptedExec stands in for the container engine: it records every argv
 * and answers from a per-test script, falling back to replies that let an
 * engine command succeed.
 */

import type { ExecAdapter, ExecOptions, ExecResult } from '@slipway/kernel';

export type Reply = Partial<ExecResult> | Error;

export interface ExecCall {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
  readonly options: ExecOptions;
}

/** Config reported for any `image inspect` the script does not answer. */
export const BASE_CONFIG = JSON.stringify({
  User: '',
  Env: ['PATH=/usr/local/bin:/usr/bin:/bin'],
  Cmd: ['python3'],
  WorkingDir: '',
});

export class ScriptedExec implements ExecAdapter {
  readonly calls: ExecCall[] = [];
  private containers = 0;

  constructor(private readonly script: (args: ReadonlyArray<string>) => Reply | undefined = () => undefined) {}

  run(command: string, args: ReadonlyArray<string>, options: ExecOptions): Promise<ExecResult> {
    this.calls.push({ command, args: [...args], options });
    const reply = this.script(args) ?? this.fallback(args);
    if (reply instanceof Error) return Promise.reject(reply);
    return Promise.resolve({
      exitCode: reply.exitCode ?? 0,
      stdout: reply.stdout ?? '',
      stderr: reply.stderr ?? '',
    });
  }

  /** Argument vectors of every call, in order. */
  argv(): ReadonlyArray<ReadonlyArray<string>> {
    return this.calls.map((c) => c.args);
  }

  private fallback(args: ReadonlyArray<string>): Partial<ExecResult> {
    if (args[0] === 'create') {
      this.containers++;
      return { stdout: `cid-${this.containers}\n` };
    }
    if (args[0] === 'image' && args[1] === 'inspect') return { stdout: BASE_CONFIG };
    return {};
  }
}

export function spawnError(code: string): Error {
  return Object.assign(new Error(`spawn docker ${code}`), { code });
}

export function at<T>(items: ReadonlyArray<T>, index: number): T {
  const item = items[index];
  if (item === undefined) throw new Error(`no item at index ${index}`);
  return item;
}

/**
 * FakeEngine keeps the set of image names an engine would hold, so tests
 * can follow layers across builds: pull, tag and commit add names, rmi
 * removes them, and inspect or create on a missing name fails. `failWhen`
 * answers a call before the image bookkeeping does.
 */
export class FakeEngine {
  readonly images = new Set<string>();
  failWhen: (args: ReadonlyArray<string>) => Reply | undefined = () => undefined;
  readonly exec = new ScriptedExec((args) => this.failWhen(args) ?? this.reply(args));

  private reply(args: ReadonlyArray<string>): Reply | undefined {
    switch (args[0]) {
      case 'pull':
        this.images.add(args[1] ?? '');
        return {};
      case 'tag':
        if (!this.images.has(args[1] ?? '')) return missing(args[1]);
        this.images.add(args[2] ?? '');
        return {};
      case 'commit':
        this.images.add(args[args.length - 1] ?? '');
        return {};
      case 'create': {
        const image = args[1] === '--user' ? args[3] : args[1];
        return this.images.has(image ?? '') ? undefined : missing(image);
      }
      case 'image':
        return this.images.has(args[4] ?? '') ? undefined : missing(args[4]);
      case 'rmi': {
        const names = args.slice(1);
        const absent = names.filter((name) => !this.images.has(name));
        for (const name of names) this.images.delete(name);
        return absent.length === 0 ? {} : missing(absent.join(', '));
      }
      default:
        return undefined;
    }
  }
}

function missing(name: string | undefined): Reply {
  return { exitCode: 1, stderr: `Error: No such image: ${name ?? ''}\n` };
}
