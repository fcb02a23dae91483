/**
 * Clipboard access through the platform's copy tool.
 */

import { execFileSync, type ExecFileSyncOptions } from 'node:child_process';

export type ExecFileFn = (file: string, args: readonly string[], options: ExecFileSyncOptions) => unknown;

export class ClipboardError extends Error {
  public readonly code = 'CLIPBOARD_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClipboardError';
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Copy text to the system clipboard.
 * Uses pbcopy (macOS), clip (Windows), or xclip with an xsel fallback (Linux).
 */
export function copyToClipboard(
  text: string,
  platform: NodeJS.Platform = process.platform,
  exec: ExecFileFn = execFileSync,
): void {
  const options: ExecFileSyncOptions = { input: text, stdio: ['pipe', 'ignore', 'pipe'] };

  try {
    if (platform === 'darwin') {
      exec('pbcopy', [], options);
    } else if (platform === 'win32') {
      exec('clip', [], options);
    } else {
      try {
        exec('xclip', ['-selection', 'clipboard'], options);
      } catch {
        exec('xsel', ['--clipboard', '--input'], options);
      }
    }
  } catch (err) {
    throw new ClipboardError(`clipboard tool not available (${errorMessage(err)})`, { cause: err });
  }
}
