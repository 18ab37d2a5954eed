/**
 * Pulumi CLI operations
 * Captured calls go through execa, streamed ones through @actions/exec
 */

import * as exec from '@actions/exec';
import { execa } from 'execa';
import fs from 'fs-extra';
import { CommandFailedError, errorMessage } from './errors.js';
import { isRecord } from './event.js';

// One row of `pulumi stack ls --json`
export interface StackSummary {
  name: string;
  current: boolean;
}

// Outcome of the wrapped command
export interface CommandResult {
  exitCode: number;
  output: string;
}

export interface PulumiOperations {
  listStacks(): Promise<StackSummary[]>;
  selectStack(name: string): Promise<void>;
  setConfig(key: string, value: string): Promise<void>;
  removeStack(name: string): Promise<void>;
  run(args: string[], outputFile: string): Promise<CommandResult>;
}

export interface PulumiCliOptions {
  cwd: string;
  env?: Record<string, string>;
  binary?: string;
}

export const PULUMI_BINARY = 'pulumi';

/**
 * Render a command line for logs and PR comments
 */
export function formatCommand(args: string[], binary = PULUMI_BINARY): string {
  return [binary, ...args].join(' ');
}

/**
 * Merge extra variables over a base environment, dropping unset entries
 */
export function buildEnv(
  base: NodeJS.ProcessEnv,
  extra: Record<string, string> = {}
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) env[key] = value;
  }
  return { ...env, ...extra };
}

/**
 * Parse `pulumi stack ls --json` output
 * @throws Error if the output is not a list of stacks
 */
export function parseStackList(stdout: string): StackSummary[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new Error(`Failed to parse pulumi stack list: ${errorMessage(error)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new Error('Failed to parse pulumi stack list: expected a JSON array');
  }

  return parsed.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.name !== 'string') {
      throw new Error(`Failed to parse pulumi stack list: entry ${index} has no name`);
    }
    return { name: entry.name, current: entry.current === true };
  });
}

/**
 * Pulumi CLI bound to a project directory and environment
 */
export class PulumiCli implements PulumiOperations {
  private cwd: string;
  private env: Record<string, string>;
  private binary: string;

  constructor(options: PulumiCliOptions) {
    this.cwd = options.cwd;
    this.env = buildEnv(process.env, options.env);
    this.binary = options.binary ?? PULUMI_BINARY;
  }

  async listStacks(): Promise<StackSummary[]> {
    const args = ['stack', 'ls', '--json'];
    const result = await execa(this.binary, args, {
      cwd: this.cwd,
      env: this.env,
      reject: false
    });

    if (result.failed) {
      if (result.stderr) console.error(result.stderr);
      // exitCode is missing at runtime when the binary could not be spawned
      const exitCode = result.exitCode > 0 ? result.exitCode : 1;
      throw new CommandFailedError(formatCommand(args, this.binary), exitCode);
    }
    return parseStackList(result.stdout);
  }

  async selectStack(name: string): Promise<void> {
    await this.runChecked(['stack', 'select', name]);
  }

  async setConfig(key: string, value: string): Promise<void> {
    await this.runChecked(['config', 'set', key, value]);
  }

  async removeStack(name: string): Promise<void> {
    await this.runChecked(['stack', 'rm', name, '--yes']);
  }

  /**
   * Run a Pulumi command, streaming its output live and appending it to outputFile
   * A non-zero exit is returned, not thrown; a failure to write outputFile is thrown
   * once the command has finished
   */
  async run(args: string[], outputFile: string): Promise<CommandResult> {
    const sink = fs.createWriteStream(outputFile, { flags: 'a' });
    const failure: { error?: Error } = {};
    sink.on('error', error => {
      if (!failure.error) failure.error = error;
    });
    const capture = (data: Buffer): void => {
      if (!failure.error) sink.write(data);
    };

    let exitCode: number;
    try {
      exitCode = await exec.exec(this.binary, args, {
        cwd: this.cwd,
        env: this.env,
        ignoreReturnCode: true,
        listeners: { stdout: capture, stderr: capture }
      });
    } finally {
      // 'close' follows both a clean finish and a failed open/write
      await new Promise<void>(resolve => {
        if (sink.closed) {
          resolve();
          return;
        }
        sink.once('close', () => resolve());
        sink.end();
      });
    }

    if (failure.error) {
      throw new Error(
        `Failed to write command output to ${outputFile}: ${errorMessage(failure.error)}`
      );
    }

    const output = await fs.readFile(outputFile, 'utf8');
    return { exitCode, output };
  }

  private async runChecked(args: string[]): Promise<void> {
    const exitCode = await exec.exec(this.binary, args, {
      cwd: this.cwd,
      env: this.env,
      ignoreReturnCode: true
    });
    if (exitCode !== 0) {
      throw new CommandFailedError(formatCommand(args, this.binary), exitCode);
    }
  }
}
