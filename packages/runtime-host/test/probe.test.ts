/**
 * Slipway Runtime Host — Probe and Launcher Tests
 *
 *   PRB-1: image facts are assembled from config, uid, packages and find
 *   PRB-2: an empty WorkingDir falls back to the recipe workdir
 *   PRB-3: an unreadable uid or failing probe is EntrypointStart
 *   PRB-4: output that is not JSON becomes a BuildError carrying it
 *   LCH-1: launch arguments pass the runtime flags explicitly
 *   LCH-2: the application's exit status is returned
 *   LCH-3: engine-reserved statuses and a missing engine are errors
 */

import { describe, it, expect } from 'vitest';
import { BuildErrorKind } from '@slipway/kernel';
import { parseEnvList, parseImageConfig } from '../src/engine/image-config.js';
import { ContainerLauncher } from '../src/engine/launcher.js';
import { DockerProbe, bytecodeFindArgs, parsePackageList } from '../src/engine/probe.js';
import { ScriptedExec, spawnError, type Reply } from './fakes.js';

const TARGET = { workdir: '/app', interpreter: 'python' };

const BUILT_CONFIG = JSON.stringify({
  User: 'app',
  Env: ['PATH=/usr/local/bin:/usr/bin', 'PYTHONDONTWRITEBYTECODE=1', 'PYTHONUNBUFFERED=1'],
  Cmd: ['python', 'main.py'],
  WorkingDir: '/app',
});

function probeScript(overrides: { config?: string; uid?: Reply; packages?: Reply; find?: Reply } = {}) {
  return (args: ReadonlyArray<string>): Reply | undefined => {
    if (args[0] === 'image') return { stdout: overrides.config ?? BUILT_CONFIG };
    switch (args[3]) {
      case 'id':
        return overrides.uid ?? { stdout: '999\n' };
      case 'python':
        return overrides.packages ?? { stdout: '[{"name":"flask","version":"3.0.0"},{"name":"pip","version":"24.0"}]' };
      case 'find':
        return overrides.find ?? { stdout: '' };
      default:
        return undefined;
    }
  };
}

describe('DockerProbe', () => {
  it('PRB-1: collects the image facts', async () => {
    const exec = new ScriptedExec(probeScript({ find: { stdout: '/app/__pycache__\n/app/util.pyc\n' } }));
    const facts = await new DockerProbe(exec).inspect('demo:1', TARGET);

    expect(facts).toEqual({
      configUser: 'app',
      configEnv: {
        PATH: '/usr/local/bin:/usr/bin',
        PYTHONDONTWRITEBYTECODE: '1',
        PYTHONUNBUFFERED: '1',
      },
      configCmd: ['python', 'main.py'],
      configEntrypoint: [],
      configWorkdir: '/app',
      effectiveUid: 999,
      packages: [
        { name: 'flask', version: '3.0.0' },
        { name: 'pip', version: '24.0' },
      ],
      bytecodeArtifacts: ['/app/__pycache__', '/app/util.pyc'],
    });
    expect(exec.argv()).toEqual([
      ['image', 'inspect', '--format', '{{json .Config}}', 'demo:1'],
      ['run', '--rm', '--entrypoint', 'id', 'demo:1', '-u'],
      ['run', '--rm', '--entrypoint', 'python', 'demo:1', '-m', 'pip', 'list', '--format=json'],
      ['run', '--rm', '--entrypoint', 'find', 'demo:1', ...bytecodeFindArgs('/app')],
    ]);
  });

  it('PRB-2: falls back to the recipe workdir', async () => {
    const config = JSON.stringify({ User: 'app', Env: [], Cmd: ['python', 'main.py'], WorkingDir: '' });
    const facts = await new DockerProbe(new ScriptedExec(probeScript({ config }))).inspect('demo:1', TARGET);
    expect(facts.configWorkdir).toBe('/app');
  });

  it('PRB-3: rejects a non-numeric uid', async () => {
    const exec = new ScriptedExec(probeScript({ uid: { stdout: 'id: cannot find name\n' } }));
    await expect(new DockerProbe(exec).inspect('demo:1', TARGET)).rejects.toMatchObject({
      kind: BuildErrorKind.EntrypointStart,
      message: 'could not read the effective uid of demo:1',
    });
  });

  it('PRB-3: a failing probe is EntrypointStart with its stderr', async () => {
    const exec = new ScriptedExec(probeScript({ find: { exitCode: 127, stderr: 'find: not found\n' } }));
    await expect(new DockerProbe(exec).inspect('demo:1', TARGET)).rejects.toMatchObject({
      kind: BuildErrorKind.EntrypointStart,
      detail: 'find: not found',
    });
  });

  it('PRB-3: an image that cannot be inspected is EngineUnavailable', async () => {
    const exec = new ScriptedExec(() => ({ exitCode: 1, stderr: 'No such image: demo:1\n' }));
    await expect(new DockerProbe(exec).inspect('demo:1', TARGET)).rejects.toMatchObject({
      kind: BuildErrorKind.EngineUnavailable,
      message: 'cannot inspect image "demo:1"',
    });
  });
});

describe('unreadable engine output', () => {
  it('PRB-4: a package list that is not JSON is EntrypointStart', async () => {
    const exec = new ScriptedExec(probeScript({ packages: { stdout: 'WARNING: pip is being invoked by an old script\n' } }));
    await expect(new DockerProbe(exec).inspect('demo:1', TARGET)).rejects.toMatchObject({
      kind: BuildErrorKind.EntrypointStart,
      message: 'the package list is not valid JSON',
      detail: 'WARNING: pip is being invoked by an old script',
    });
  });

  it('PRB-4: an image config that is not JSON is EngineUnavailable', async () => {
    const exec = new ScriptedExec(probeScript({ config: '' }));
    await expect(new DockerProbe(exec).inspect('demo:1', TARGET)).rejects.toMatchObject({
      kind: BuildErrorKind.EngineUnavailable,
      message: 'image inspect printed no readable config',
      detail: '',
    });
  });
});

describe('probe parsing', () => {
  it('builds a find expression for bytecode caches', () => {
    expect(bytecodeFindArgs('/app')).toEqual([
      '/app', '(', '-name', '__pycache__', '-o', '-name', '*.pyc', '-o', '-name', '*.pyo', ')', '-print',
    ]);
  });

  it('skips malformed package entries', () => {
    expect(parsePackageList('[{"name":"flask","version":"3.0.0"},{"name":"x"},7]')).toEqual([
      { name: 'flask', version: '3.0.0' },
    ]);
    expect(parsePackageList('{"name":"flask"}')).toEqual([]);
  });

  it('splits env entries at the first =', () => {
    expect(parseEnvList(['A=1', 'B=x=y', 'C=', 'broken', '=nameless'])).toEqual({ A: '1', B: 'x=y', C: '' });
  });

  it('reads an image config with missing fields', () => {
    expect(parseImageConfig('{"User":"app"}')).toEqual({ user: 'app', env: {}, cmd: [], entrypoint: [], workdir: '' });
    expect(parseImageConfig('null')).toEqual({ user: '', env: {}, cmd: [], entrypoint: [], workdir: '' });
    expect(parseImageConfig('{"Entrypoint":["tini","--"]}').entrypoint).toEqual(['tini', '--']);
  });
});

describe('ContainerLauncher', () => {
  const env = { PYTHONDONTWRITEBYTECODE: '1', PYTHONUNBUFFERED: '1' };

  it('LCH-1: passes the flags, env file and command explicitly', () => {
    const launcher = new ContainerLauncher(new ScriptedExec());
    expect(launcher.launchArgs('demo:1', { env, envFile: '.env', command: ['python', '-V'] })).toEqual([
      'run', '--rm', '--init=false',
      '-e', 'PYTHONDONTWRITEBYTECODE=1',
      '-e', 'PYTHONUNBUFFERED=1',
      '--env-file', '.env',
      'demo:1',
      'python', '-V',
    ]);
    expect(launcher.launchArgs('demo:1', { env: {} })).toEqual(['run', '--rm', '--init=false', 'demo:1']);
  });

  it('LCH-2: returns the application exit status with stdio attached', async () => {
    const exec = new ScriptedExec(() => ({ exitCode: 3 }));
    expect(await new ContainerLauncher(exec, 'podman').start('demo:1', { env })).toBe(3);
    expect(exec.calls).toHaveLength(1);
    expect(exec.calls[0]?.command).toBe('podman');
    expect(exec.calls[0]?.options).toEqual({ inheritStdio: true });
  });

  it('LCH-3: an engine-reserved status is EntrypointStart', async () => {
    const exec = new ScriptedExec(() => ({ exitCode: 127, stderr: 'exec: "python": not found\n' }));
    await expect(new ContainerLauncher(exec).start('demo:1', { env })).rejects.toMatchObject({
      kind: BuildErrorKind.EntrypointStart,
      message: 'demo:1 could not start its entrypoint (status 127)',
      detail: 'exec: "python": not found',
    });
  });

  it('LCH-3: a missing engine is EngineUnavailable', async () => {
    const exec = new ScriptedExec(() => spawnError('ENOENT'));
    await expect(new ContainerLauncher(exec).start('demo:1', { env })).rejects.toMatchObject({
      kind: BuildErrorKind.EngineUnavailable,
    });
  });
});
