import { describe, it, expect } from 'vitest';
import { BackendInvocationError, BackendMissingError } from '../errors';
import { createComposeBridge, parseStatusOutput, type RuntimeBridge } from '../services/compose.service';
import { fakeSpawn, notFoundError, type FakeRun } from './helpers/fake-process';

const PS_OUTPUT = [
  'NAME      IMAGE             COMMAND                  SERVICE   CREATED       STATUS       PORTS',
  'n8n       n8nio/n8n         "tini -- /docker-ent…"   n8n       2 hours ago   Up 2 hours   5678/tcp',
  'traefik   traefik:v2.10     "/entrypoint.sh --pr…"   traefik   2 hours ago   Up 2 hours   0.0.0.0:80->80/tcp',
  '',
].join('\n');

function bridgeFor(run: FakeRun, options: { command?: string; args?: string[] } = {}) {
  const { spawn, processes } = fakeSpawn(run);
  const bridge: RuntimeBridge = createComposeBridge({ ...options, cwd: '/srv/n8n', spawn });
  return { bridge, spawn, processes };
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const result: string[] = [];
  for await (const line of lines) {
    result.push(line);
  }
  return result;
}

describe('parseStatusOutput', () => {
  it('should return nothing for empty output', () => {
    expect(parseStatusOutput('')).toEqual([]);
    expect(parseStatusOutput('\n  \n')).toEqual([]);
  });

  it('should return nothing for a header-only table', () => {
    expect(parseStatusOutput('NAME   IMAGE   COMMAND   SERVICE   CREATED   STATUS   PORTS\n')).toEqual([]);
  });

  it('should take the first column as the name', () => {
    expect(parseStatusOutput(PS_OUTPUT).map((s) => s.name)).toEqual(['n8n', 'traefik']);
  });

  it('should keep each row as printed', () => {
    const [n8n] = parseStatusOutput(PS_OUTPUT);
    expect(n8n.line).toBe(PS_OUTPUT.split('\n')[1]);
  });
});

describe('getStatus', () => {
  it('should run docker compose ps in the project directory', async () => {
    const { bridge, spawn } = bridgeFor({ stdout: '' });

    await bridge.getStatus();

    expect(spawn).toHaveBeenCalledWith('docker', ['compose', 'ps'], {
      cwd: '/srv/n8n',
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  });

  it('should return an empty list when nothing is running', async () => {
    const { bridge } = bridgeFor({ stdout: '' });
    expect(await bridge.getStatus()).toEqual([]);
  });

  it('should list running services', async () => {
    const { bridge } = bridgeFor({ stdout: PS_OUTPUT });
    expect((await bridge.getStatus()).map((s) => s.name)).toEqual(['n8n', 'traefik']);
  });

  it('should raise BackendMissingError when the backend is not installed', async () => {
    const { bridge } = bridgeFor({ error: notFoundError('docker') });

    const error = await bridge.getStatus().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendMissingError);
    expect(error).toMatchObject({ command: 'docker', exitCode: 127 });
  });

  it('should raise BackendInvocationError with the backend diagnostics on a non-zero exit', async () => {
    const { bridge } = bridgeFor({
      code: 1,
      stderr: 'Cannot connect to the Docker daemon. Is the docker daemon running?\n',
    });

    const error = await bridge.getStatus().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendInvocationError);
    expect(error).toMatchObject({
      backendExitCode: 1,
      stderr: 'Cannot connect to the Docker daemon. Is the docker daemon running?\n',
      message: 'docker compose ps exited with code 1',
    });
  });

  it('should use the configured backend command', async () => {
    const { bridge, spawn } = bridgeFor({ stdout: '' }, { command: 'podman', args: ['compose', '-f', 'stack.yml'] });

    await bridge.getStatus();

    expect(spawn.mock.calls[0][0]).toBe('podman');
    expect(spawn.mock.calls[0][1]).toEqual(['compose', '-f', 'stack.yml', 'ps']);
  });
});

describe('getStatusReport', () => {
  it('should keep the raw output for printing', async () => {
    const { bridge } = bridgeFor({ stdout: PS_OUTPUT });

    const report = await bridge.getStatusReport();

    expect(report.output).toBe(PS_OUTPUT);
    expect(report.services).toHaveLength(2);
  });
});

describe('checkAvailable', () => {
  it('should return the backend version', async () => {
    const { bridge, spawn } = bridgeFor({ stdout: 'Docker Compose version v2.29.1\n' });

    expect(await bridge.checkAvailable()).toBe('Docker Compose version v2.29.1');
    expect(spawn.mock.calls[0][1]).toEqual(['compose', 'version']);
  });
});

describe('streamLogs', () => {
  it('should yield each line and finish when the backend exits', async () => {
    const { bridge, spawn } = bridgeFor({ stdout: 'n8n  | started\nn8n  | ready\n' });

    expect(await collect(bridge.streamLogs())).toEqual(['n8n  | started', 'n8n  | ready']);
    expect(spawn.mock.calls[0][1]).toEqual(['compose', 'logs']);
  });

  it('should pass the follow flag and service name', async () => {
    const { bridge, spawn } = bridgeFor({ stdout: '' });

    await collect(bridge.streamLogs({ service: 'n8n', follow: true }));

    expect(spawn.mock.calls[0][1]).toEqual(['compose', 'logs', '-f', 'n8n']);
  });

  it('should not spawn anything until iterated', () => {
    const { bridge, spawn } = bridgeFor({ stdout: '' });
    bridge.streamLogs();
    expect(spawn).not.toHaveBeenCalled();
  });

  it('should raise BackendMissingError when the backend is not installed', async () => {
    const { bridge } = bridgeFor({ error: notFoundError('docker') });
    await expect(collect(bridge.streamLogs())).rejects.toThrow(BackendMissingError);
  });

  it('should raise BackendInvocationError on a non-zero exit', async () => {
    const { bridge } = bridgeFor({ code: 1, stderr: 'no such service: redis\n' });

    const error = await collect(bridge.streamLogs({ service: 'redis' })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendInvocationError);
    expect(error).toMatchObject({ stderr: 'no such service: redis\n' });
  });

  it('should stop the backend when the consumer stops reading', async () => {
    const { bridge, processes } = bridgeFor({ stdout: 'first\nsecond\n', hang: true });
    const lines: string[] = [];

    for await (const line of bridge.streamLogs({ follow: true })) {
      lines.push(line);
      break;
    }

    expect(lines).toEqual(['first']);
    expect(processes[0].killed).toBe(true);
  });

  it('should end quietly when aborted', async () => {
    const { bridge, processes } = bridgeFor({ stdout: 'first\n', hang: true });
    const controller = new AbortController();
    const lines: string[] = [];

    for await (const line of bridge.streamLogs({ follow: true, signal: controller.signal })) {
      lines.push(line);
      controller.abort();
    }

    expect(lines).toEqual(['first']);
    expect(processes).toHaveLength(1);
  });

  it('should not start when already aborted', async () => {
    const { bridge, spawn } = bridgeFor({ stdout: 'first\n' });
    const controller = new AbortController();
    controller.abort();

    expect(await collect(bridge.streamLogs({ signal: controller.signal }))).toEqual([]);
    expect(spawn).not.toHaveBeenCalled();
  });
});
