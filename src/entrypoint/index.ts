/**
 * Pulumi CI entrypoint
 *
 * Resolves the stack for the triggering branch, runs the forwarded Pulumi
 * command and reports the result back to GitHub
 */

import * as core from '@actions/core';
import path from 'path';
import { withFile } from 'tmp-promise';
import { detectCiContext } from '../shared/ci.js';
import type { EntrypointConfig } from '../shared/config.js';
import { ConfigurationError, errorMessage, isCommandFailedError, isSkipRunError } from '../shared/errors.js';
import { readEventPayload, type EventPayload } from '../shared/event.js';
import { GitHubClient, type CommentPoster } from '../shared/github.js';
import { ensureDependencies } from '../shared/packages.js';
import { PulumiCli, formatCommand, type PulumiCliOptions, type PulumiOperations } from '../shared/pulumi.js';
import { getMappingFilePath, resolveStack } from '../shared/stacks.js';
import { dispatchPostAction, type PostActionResult } from './post-actions.js';

export const REGION_CONFIG_KEY = 'aws:region';

export interface EntrypointDependencies {
  createPulumi: (options: PulumiCliOptions) => PulumiOperations;
  createGitHubClient: (token: string) => CommentPoster;
  ensureDependencies: (cwd: string, env: Record<string, string>) => Promise<boolean>;
}

export interface EntrypointResult {
  // Exit code of the wrapped Pulumi command
  exitCode: number;
  stack?: string;
  postAction: PostActionResult;
}

export function createDefaultDependencies(): EntrypointDependencies {
  return {
    createPulumi: options => new PulumiCli(options),
    createGitHubClient: token => new GitHubClient(token),
    ensureDependencies
  };
}

/**
 * Map an error that escaped the run onto the process exit code
 * Skips exit 0, failed commands keep their own exit code
 */
export function exitCodeForError(error: unknown): number {
  if (isSkipRunError(error)) {
    for (const line of error.lines) console.log(line);
    return 0;
  }
  if (isCommandFailedError(error)) {
    core.error(error.message);
    return error.exitCode;
  }
  core.setFailed(errorMessage(error));
  return 1;
}

export class Entrypoint {
  private config: EntrypointConfig;
  private deps: EntrypointDependencies;
  private payload?: Promise<EventPayload>;

  constructor(config: EntrypointConfig, deps: EntrypointDependencies = createDefaultDependencies()) {
    this.config = config;
    this.deps = deps;
  }

  /**
   * Directory the Pulumi project lives in
   * PULUMI_ROOT (relative to the invocation dir) only applies in CI mode
   */
  get workDir(): string {
    const root = this.config.ciMode ? this.config.projectRoot : undefined;
    return path.resolve(this.config.invocationDir, root ?? '.');
  }

  /**
   * Run the entrypoint
   * Anything failing before the wrapped command throws; the wrapped command's
   * own failure is returned as the exit code once post actions have run
   */
  async run(): Promise<EntrypointResult> {
    const ci = await detectCiContext(this.config, () => this.loadPayload());
    const pulumi = this.deps.createPulumi({ cwd: this.workDir, env: ci.env });
    const mappingFile = getMappingFilePath(this.config.invocationDir);

    let stack: string | undefined;
    if (ci.branch) {
      stack = await resolveStack({
        branch: ci.branch,
        mappingFile,
        listStacks: () => pulumi.listStacks()
      });
      await pulumi.selectStack(stack);
    }

    if (await this.deps.ensureDependencies(this.workDir, ci.env)) {
      core.info('Installed project dependencies');
    }

    const { args, region, github, projectRoot } = this.config;
    const command = formatCommand(args);
    core.info(`\`${command}\``);
    core.info(`\`${formatCommand(['config', 'set', REGION_CONFIG_KEY, region])}\``);
    core.info(`\`${github.workspace ?? ''}/${projectRoot ?? 'public'}\``);

    await pulumi.setConfig(REGION_CONFIG_KEY, region);
    const { exitCode, output } = await withFile(({ path: outputFile }) => pulumi.run(args, outputFile));
    if (exitCode !== 0) {
      core.error(`\`${command}\` exited with code ${exitCode}`);
    }

    let postAction: PostActionResult;
    try {
      postAction = await dispatchPostAction({
        eventName: github.eventName,
        loadPayload: () => this.loadPayload(),
        command,
        output,
        token: github.token,
        removeStackOnDelete: this.config.removeStackOnDelete,
        mappingFile,
        createGitHubClient: this.deps.createGitHubClient,
        pulumi
      });
    } catch (error) {
      // The wrapped command's exit code wins over post action failures
      core.warning(`Post action for ${github.eventName} event failed: ${errorMessage(error)}`);
      postAction = { kind: 'failed', error: errorMessage(error) };
    }

    return { exitCode, stack, postAction };
  }

  private loadPayload(): Promise<EventPayload> {
    const eventPath = this.config.github.eventPath;
    if (!eventPath) {
      return Promise.reject(new ConfigurationError('GITHUB_EVENT_PATH is not set'));
    }
    if (!this.payload) {
      this.payload = readEventPayload(eventPath);
    }
    return this.payload;
  }
}
