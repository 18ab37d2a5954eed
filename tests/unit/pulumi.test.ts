/**
 * Unit tests for the Pulumi CLI wrapper
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ExecOptions } from '@actions/exec';
import fs from 'fs-extra';
import path from 'path';
import { file as tmpFile } from 'tmp-promise';
import {
  PulumiCli,
  buildEnv,
  formatCommand,
  parseStackList
} from '../../src/shared/pulumi.js';
import { CommandFailedError } from '../../src/shared/errors.js';

const { execMock, execaMock } = vi.hoisted(() => ({
  execMock: vi.fn(),
  execaMock: vi.fn()
}));

vi.mock('@actions/exec', () => ({ exec: execMock }));
vi.mock('execa', () => ({ execa: execaMock }));

describe('formatCommand', () => {
  it('should prefix the binary', () => {
    expect(formatCommand(['preview', '--diff'])).toBe('pulumi preview --diff');
    expect(formatCommand(['install'], 'npm')).toBe('npm install');
  });
});

describe('buildEnv', () => {
  it('should drop unset entries and apply overrides', () => {
    expect(buildEnv({ HOME: '/root', EMPTY: undefined, CI: 'false' }, { CI: 'true' })).toEqual({
      HOME: '/root',
      CI: 'true'
    });
  });
});

describe('parseStackList', () => {
  it('should read names and the current marker', () => {
    const stdout = JSON.stringify([
      { name: 'dev', current: true, updateInProgress: false },
      { name: 'prod', current: false }
    ]);

    expect(parseStackList(stdout)).toEqual([
      { name: 'dev', current: true },
      { name: 'prod', current: false }
    ]);
  });

  it('should reject output that is not a stack list', () => {
    expect(() => parseStackList('no stacks')).toThrow('Failed to parse pulumi stack list');
    expect(() => parseStackList('{}')).toThrow('expected a JSON array');
    expect(() => parseStackList('[{"current":true}]')).toThrow('entry 0 has no name');
  });
});

describe('PulumiCli', () => {
  let cli: PulumiCli;

  beforeEach(() => {
    execMock.mockReset();
    execaMock.mockReset();
    cli = new PulumiCli({ cwd: '/work/infra', env: { PULUMI_CI_SYSTEM: 'GitHub' } });
  });

  describe('listStacks', () => {
    it('should list stacks in the project directory', async () => {
      execaMock.mockResolvedValue({
        failed: false,
        exitCode: 0,
        stdout: '[{"name":"dev","current":true}]',
        stderr: ''
      });

      await expect(cli.listStacks()).resolves.toEqual([{ name: 'dev', current: true }]);
      expect(execaMock).toHaveBeenCalledWith(
        'pulumi',
        ['stack', 'ls', '--json'],
        expect.objectContaining({ cwd: '/work/infra', reject: false })
      );
      expect(execaMock.mock.calls[0][2].env.PULUMI_CI_SYSTEM).toBe('GitHub');
    });

    it('should fail fast with the command exit code', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      execaMock.mockResolvedValue({ failed: true, exitCode: 255, stdout: '', stderr: 'no login' });

      const error = await cli.listStacks().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommandFailedError);
      expect(error).toMatchObject({ command: 'pulumi stack ls --json', exitCode: 255 });
    });
  });

  describe('checked commands', () => {
    it('should select a stack', async () => {
      execMock.mockResolvedValue(0);

      await cli.selectStack('prod');

      expect(execMock).toHaveBeenCalledWith(
        'pulumi',
        ['stack', 'select', 'prod'],
        expect.objectContaining({ cwd: '/work/infra', ignoreReturnCode: true })
      );
    });

    it('should set a config value', async () => {
      execMock.mockResolvedValue(0);

      await cli.setConfig('aws:region', 'us-east-1');

      expect(execMock.mock.calls[0][1]).toEqual(['config', 'set', 'aws:region', 'us-east-1']);
    });

    it('should remove a stack without prompting', async () => {
      execMock.mockResolvedValue(0);

      await cli.removeStack('feature-login');

      expect(execMock.mock.calls[0][1]).toEqual(['stack', 'rm', 'feature-login', '--yes']);
    });

    it('should throw CommandFailedError on a non-zero exit', async () => {
      execMock.mockResolvedValue(4);

      await expect(cli.selectStack('prod')).rejects.toMatchObject({
        command: 'pulumi stack select prod',
        exitCode: 4
      });
    });
  });

  describe('run', () => {
    let output: Awaited<ReturnType<typeof tmpFile>>;

    beforeEach(async () => {
      output = await tmpFile();
    });

    afterEach(async () => {
      await output.cleanup();
    });

    it('should capture stdout and stderr and keep the exit code', async () => {
      execMock.mockImplementation(async (_cmd: string, _args: string[], options?: ExecOptions) => {
        options?.listeners?.stdout?.(Buffer.from('Previewing update (prod)\n'));
        options?.listeners?.stderr?.(Buffer.from('error: boom\n'));
        return 2;
      });

      const result = await cli.run(['preview'], output.path);

      expect(result).toEqual({
        exitCode: 2,
        output: 'Previewing update (prod)\nerror: boom\n'
      });
      expect(await fs.readFile(output.path, 'utf8')).toBe(
        'Previewing update (prod)\nerror: boom\n'
      );
      expect(execMock).toHaveBeenCalledWith(
        'pulumi',
        ['preview'],
        expect.objectContaining({ ignoreReturnCode: true })
      );
    });

    it('should close the output file when the command cannot start', async () => {
      execMock.mockRejectedValue(new Error('Unable to locate executable file: pulumi'));

      await expect(cli.run(['up'], output.path)).rejects.toThrow('Unable to locate executable file');
    });

    it('should reject instead of crashing when the output file cannot be written', async () => {
      const missing = path.join(path.dirname(output.path), `missing-${Date.now()}`, 'out.txt');
      execMock.mockImplementation(async (_cmd: string, _args: string[], options?: ExecOptions) => {
        options?.listeners?.stdout?.(Buffer.from('hi\n'));
        await new Promise(resolve => setTimeout(resolve, 50));
        options?.listeners?.stdout?.(Buffer.from('bye\n'));
        return 0;
      });

      await expect(cli.run(['up'], missing)).rejects.toThrow(
        `Failed to write command output to ${missing}`
      );
    });
  });
});
