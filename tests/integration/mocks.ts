/**
 * Test Mocks for Integration Testing
 *
 * Mocks the Pulumi CLI, the GitHub API and npm
 */

import { vi } from 'vitest';
import fs from 'fs-extra';
import type { EntrypointDependencies } from '../../src/entrypoint/index.js';
import { CommandFailedError } from '../../src/shared/errors.js';
import type { PulumiCliOptions, PulumiOperations, StackSummary } from '../../src/shared/pulumi.js';

// Mock responses storage
export interface MockState {
  stacks: StackSummary[];
  selectedStack: string | null;
  removedStacks: string[];
  config: Map<string, string>;
  comments: Array<{ url: string; body: string; token: string }>;
  // Every Pulumi invocation, in order
  commands: string[][];
  pulumiOptions: PulumiCliOptions[];
  installs: string[];
  // Behaviour of the wrapped command
  runOutput: string;
  runExitCode: number;
  // Exit code for `pulumi stack select`
  selectExitCode: number;
  // Exit code for `pulumi config set`
  configExitCode: number;
  // Exit code for `npm install`
  installExitCode: number;
  commentError: Error | null;
}

export function createMockState(): MockState {
  return {
    stacks: [],
    selectedStack: null,
    removedStacks: [],
    config: new Map(),
    comments: [],
    commands: [],
    pulumiOptions: [],
    installs: [],
    runOutput: '',
    runExitCode: 0,
    selectExitCode: 0,
    configExitCode: 0,
    installExitCode: 0,
    commentError: null
  };
}

/**
 * Create mock Pulumi CLI
 */
export function createMockPulumi(state: MockState): PulumiOperations {
  return {
    listStacks: vi.fn(async () => {
      state.commands.push(['stack', 'ls', '--json']);
      return state.stacks;
    }),

    selectStack: vi.fn(async (name: string) => {
      state.commands.push(['stack', 'select', name]);
      if (state.selectExitCode !== 0) {
        throw new CommandFailedError(`pulumi stack select ${name}`, state.selectExitCode);
      }
      state.selectedStack = name;
    }),

    setConfig: vi.fn(async (key: string, value: string) => {
      state.commands.push(['config', 'set', key, value]);
      if (state.configExitCode !== 0) {
        throw new CommandFailedError(`pulumi config set ${key} ${value}`, state.configExitCode);
      }
      state.config.set(key, value);
    }),

    removeStack: vi.fn(async (name: string) => {
      state.commands.push(['stack', 'rm', name, '--yes']);
      state.removedStacks.push(name);
    }),

    run: vi.fn(async (args: string[], outputFile: string) => {
      state.commands.push(args);
      await fs.appendFile(outputFile, state.runOutput);
      return {
        exitCode: state.runExitCode,
        output: await fs.readFile(outputFile, 'utf8')
      };
    })
  };
}

/**
 * Create the entrypoint dependencies backed by the mock state
 */
export function createMockDependencies(state: MockState): EntrypointDependencies {
  const pulumi = createMockPulumi(state);

  return {
    createPulumi: vi.fn((options: PulumiCliOptions) => {
      state.pulumiOptions.push(options);
      return pulumi;
    }),

    createGitHubClient: vi.fn((token: string) => ({
      createComment: vi.fn(async (url: string, body: string) => {
        if (state.commentError) throw state.commentError;
        state.comments.push({ url, body, token });
      })
    })),

    ensureDependencies: vi.fn(async (cwd: string) => {
      state.installs.push(cwd);
      if (state.installExitCode !== 0) {
        throw new CommandFailedError('npm install', state.installExitCode);
      }
      return false;
    })
  };
}
