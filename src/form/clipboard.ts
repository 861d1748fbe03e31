/**
 * Clipboard access through the platform's copy command
 *
 * The text is piped to the first command that succeeds. Copying never
 * rejects: when no command works the result is false and the caller carries on.
 */

import { spawn } from 'child_process';
import { debugLog } from '../utils/debug-logger.js';

export interface ClipboardCommand {
  command: string;
  args: string[];
}

/**
 * Give up on a copy command that has not exited after this long
 */
const COPY_TIMEOUT_MS = 5000;

/**
 * Copy commands to try, in order, for a platform
 */
export function clipboardCommands(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): ClipboardCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ command: 'pbcopy', args: [] }];
    case 'win32':
      return [{ command: 'clip', args: [] }];
    default: {
      const x11: ClipboardCommand[] = [
        { command: 'xclip', args: ['-selection', 'clipboard'] },
        { command: 'xsel', args: ['--clipboard', '--input'] },
      ];
      return env.WAYLAND_DISPLAY ? [{ command: 'wl-copy', args: [] }, ...x11] : x11;
    }
  }
}

function runCopyCommand({ command, args }: ClipboardCommand, text: string): Promise<boolean> {
  return new Promise(resolve => {
    const child = spawn(command, args, {
      stdio: ['pipe', 'ignore', 'ignore'],
      timeout: COPY_TIMEOUT_MS,
    });

    child.on('error', error => {
      debugLog('DEBUG', `Clipboard command ${command} failed: ${error.message}`);
      resolve(false);
    });

    child.on('close', code => {
      resolve(code === 0);
    });

    // EPIPE when the command exits before reading its input
    child.stdin.on('error', error => {
      debugLog('DEBUG', `Clipboard command ${command} closed its input: ${error.message}`);
    });

    child.stdin.end(text);
  });
}

/**
 * Copy text to the system clipboard
 * @returns true when a copy command accepted the text
 */
export async function copyToClipboard(text: string, commands: ClipboardCommand[] = clipboardCommands()): Promise<boolean> {
  for (const command of commands) {
    if (await runCopyCommand(command, text)) {
      debugLog('INFO', `Copied '${text}' to clipboard`, { command: command.command });
      return true;
    }
  }

  debugLog('WARN', 'No clipboard command succeeded', { tried: commands.map(c => c.command) });
  return false;
}
