/**
 * Built-in secret engines backed by external CLIs.
 */

import { spawn } from 'child_process';
import { SECRET_ENGINE_TIMEOUT_MS } from '../constants.js';
import { logger } from '../logger.js';
import type { SecretEngine } from './types.js';

export const ONEPASSWORD_ENGINE = '1password';

export interface CommandResult {
  success: boolean;
  output: string;
  error?: string;
}

/**
 * Run a command without a shell and capture its output.
 * Never rejects; failures are reported in the result.
 */
export function runCommand(
  command: string,
  args: string[],
  options: { timeout?: number } = {}
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const timeout = options.timeout ?? SECRET_ENGINE_TIMEOUT_MS;

    const proc = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    const timeoutId = setTimeout(() => {
      proc.kill('SIGTERM');
      resolve({
        success: false,
        output: stdout,
        error: `${command} timed out after ${timeout}ms`,
      });
    }, timeout);

    proc.on('close', (code) => {
      clearTimeout(timeoutId);
      if (code === 0) {
        resolve({ success: true, output: stdout.trim() });
      } else {
        resolve({
          success: false,
          output: stdout.trim(),
          error: stderr.trim() || `${command} exited with code ${code}`,
        });
      }
    });

    proc.on('error', (err) => {
      clearTimeout(timeoutId);
      resolve({
        success: false,
        output: stdout.trim(),
        error: `Failed to execute ${command}: ${err.message}`,
      });
    });
  });
}

export type CommandRunner = typeof runCommand;

/**
 * Engine dispatcher for the CLI. `1password` runs `op read <reference>`.
 */
export class CliSecretEngine implements SecretEngine {
  private run: CommandRunner;
  private timeout: number;

  constructor(options: { run?: CommandRunner; timeout?: number } = {}) {
    this.run = options.run ?? runCommand;
    this.timeout = options.timeout ?? SECRET_ENGINE_TIMEOUT_MS;
  }

  async resolve(engine: string, reference: string): Promise<string> {
    if (engine !== ONEPASSWORD_ENGINE) {
      throw new Error(`Unknown secret engine: ${engine}`);
    }

    logger.debug(`Reading secret ${reference} via op`);
    const result = await this.run('op', ['read', reference], { timeout: this.timeout });
    if (!result.success) {
      throw new Error(result.error ?? 'op read failed');
    }
    if (result.output === '') {
      throw new Error('op read returned an empty value');
    }
    return result.output;
  }
}
