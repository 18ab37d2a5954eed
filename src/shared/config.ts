/**
 * Entrypoint configuration
 * Reads the CI environment into a typed config object
 */

import { ConfigurationError } from './errors.js';

export const DEFAULT_REGION = 'us-east-1';

// `pr` previews against the PR's base branch, anything else targets the pushed ref
export type CiMode = 'pr' | 'push';

// GitHub Actions variables the entrypoint consumes
export interface GitHubEnvironment {
  workflow?: string;
  eventName?: string;
  eventPath?: string;
  ref?: string;
  sha?: string;
  token?: string;
  workspace?: string;
}

export interface EntrypointConfig {
  ciMode?: CiMode;
  projectRoot?: string;
  github: GitHubEnvironment;
  region: string;
  removeStackOnDelete: boolean;
  args: string[];
  invocationDir: string;
}

/**
 * Read a variable, treating empty strings as unset
 */
function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value ? value : undefined;
}

/**
 * Map the PULUMI_CI flag onto a CI mode
 * @param value - Raw PULUMI_CI value
 * @returns undefined when CI mode is off
 */
export function parseCiMode(value: string | undefined): CiMode | undefined {
  if (!value) return undefined;
  return value === 'pr' ? 'pr' : 'push';
}

/**
 * Build the entrypoint config from the environment and forwarded arguments
 * @param env - Process environment
 * @param argv - Arguments forwarded to the Pulumi CLI
 * @param invocationDir - Directory the entrypoint was started in
 * @throws ConfigurationError if no Pulumi arguments were given
 */
export function loadEntrypointConfig(
  env: NodeJS.ProcessEnv,
  argv: string[],
  invocationDir = process.cwd()
): EntrypointConfig {
  if (argv.length === 0) {
    throw new ConfigurationError(
      'No Pulumi command given. Pass the Pulumi subcommand and flags as arguments, e.g. `preview --non-interactive`'
    );
  }

  return {
    ciMode: parseCiMode(readVar(env, 'PULUMI_CI')),
    projectRoot: readVar(env, 'PULUMI_ROOT'),
    github: {
      workflow: readVar(env, 'GITHUB_WORKFLOW'),
      eventName: readVar(env, 'GITHUB_EVENT_NAME'),
      eventPath: readVar(env, 'GITHUB_EVENT_PATH'),
      ref: readVar(env, 'GITHUB_REF'),
      sha: readVar(env, 'GITHUB_SHA'),
      token: readVar(env, 'GITHUB_TOKEN'),
      workspace: readVar(env, 'GITHUB_WORKSPACE')
    },
    region: readVar(env, 'AWS_REGION') ?? DEFAULT_REGION,
    removeStackOnDelete: readVar(env, 'PULUMI_CI_REMOVE_STACK_ON_DELETE') === 'true',
    args: [...argv],
    invocationDir
  };
}
