import { spawn } from 'node:child_process';

/** Opens a URL in a user agent. A rejection means the user must open it by hand. */
export interface UserAgentLauncher {
  open(url: string): Promise<void>;
}

/**
 * Launches the platform's default browser:
 * `open` on macOS, `cmd /c start` on Windows, `xdg-open` elsewhere.
 */
export class SystemBrowserLauncher implements UserAgentLauncher {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  open(url: string): Promise<void> {
    const [command, args] = this.commandFor(url);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: 'ignore' });

      child.once('error', (err) => reject(err));
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }

  private commandFor(url: string): [string, string[]] {
    switch (this.platform) {
      case 'darwin':
        return ['open', [url]];
      case 'win32':
        return ['cmd', ['/c', 'start', '', url.replace(/&/g, '^&')]];
      default:
        return ['xdg-open', [url]];
    }
  }
}

/** Never opens anything; the URL is only logged by the caller. */
export class ManualLauncher implements UserAgentLauncher {
  async open(): Promise<void> {
    throw new Error('Automatic browser launch disabled');
  }
}
