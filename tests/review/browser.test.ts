import { describe, it, expect, vi } from 'vitest';
import { ChildProcess, type SpawnOptions } from 'child_process';
import { browserCommand, openUrlInBrowser } from '../../src/review/browser.js';

describe('browserCommand', () => {
  it('picks the opener for the platform', () => {
    expect(browserCommand('https://example.test', 'darwin')).toEqual({ command: 'open', args: ['https://example.test'] });
    expect(browserCommand('https://example.test', 'win32')).toEqual({
      command: 'cmd',
      args: ['/c', 'start', '', 'https://example.test'],
    });
    expect(browserCommand('https://example.test', 'linux')).toEqual({ command: 'xdg-open', args: ['https://example.test'] });
  });
});

describe('openUrlInBrowser', () => {
  it('resolves once the opener has started', async () => {
    const child = new ChildProcess();
    const spawn = vi.fn((_command: string, _args: string[], _options: SpawnOptions) => child);
    const opened = openUrlInBrowser('https://example.test', { platform: 'linux', spawn });
    child.emit('spawn');
    await expect(opened).resolves.toBeUndefined();
    expect(spawn).toHaveBeenCalledWith('xdg-open', ['https://example.test'], { detached: true, stdio: 'ignore' });
  });

  it('rejects when the opener cannot start', async () => {
    const child = new ChildProcess();
    const opened = openUrlInBrowser('https://example.test', { platform: 'linux', spawn: () => child });
    child.emit('error', new Error('spawn xdg-open ENOENT'));
    await expect(opened).rejects.toThrow('Failed to open browser: spawn xdg-open ENOENT');
  });
});
