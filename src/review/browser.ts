import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from 'child_process';

export interface BrowserCommand {
  command: string;
  args: string[];
}

export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): BrowserCommand {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

export interface OpenUrlOptions {
  platform?: NodeJS.Platform;
  spawn?: (command: string, args: string[], options: SpawnOptions) => ChildProcess;
}

/** Start the platform URL opener without waiting for it to exit. */
export function openUrlInBrowser(url: string, options: OpenUrlOptions = {}): Promise<void> {
  const { command, args } = browserCommand(url, options.platform);
  const spawn = options.spawn ?? ((cmd: string, cmdArgs: string[], spawnOptions: SpawnOptions) => nodeSpawn(cmd, cmdArgs, spawnOptions));
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', err => reject(new Error(`Failed to open browser: ${err.message}`, { cause: err })));
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
