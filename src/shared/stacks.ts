/**
 * Stack resolution
 * Maps a branch onto a Pulumi stack via .pulumi/ci.json, e.g.
 *
 *   { "main": "prod", "staging": "staging" }
 */

import fs from 'fs-extra';
import path from 'path';
import { ConfigurationError, SkipRunError, errorMessage } from './errors.js';
import { isRecord } from './event.js';
import type { StackSummary } from './pulumi.js';

export const BRANCH_MAPPING_FILE = path.join('.pulumi', 'ci.json');

// Branch name -> stack name
export type BranchMapping = Record<string, unknown>;

export interface ResolveStackOptions {
  branch: string;
  mappingFile: string;
  listStacks: () => Promise<StackSummary[]>;
}

export function getMappingFilePath(invocationDir: string): string {
  return path.join(invocationDir, BRANCH_MAPPING_FILE);
}

/**
 * Load the branch mapping file
 * @returns undefined when the file does not exist
 * @throws ConfigurationError if the file is not a JSON object
 */
export async function readBranchMapping(mappingFile: string): Promise<BranchMapping | undefined> {
  if (!(await fs.pathExists(mappingFile))) return undefined;

  let mapping: unknown;
  try {
    mapping = await fs.readJson(mappingFile);
  } catch (error) {
    throw new ConfigurationError(`Failed to read ${mappingFile}: ${errorMessage(error)}`);
  }
  if (!isRecord(mapping)) {
    throw new ConfigurationError(`${mappingFile} must map branch names to stack names`);
  }
  return mapping;
}

/**
 * Look up the stack for a branch; anything but a usable name counts as unmapped
 */
export function lookupStack(mapping: BranchMapping, branch: string): string | undefined {
  const stack = Object.prototype.hasOwnProperty.call(mapping, branch) ? mapping[branch] : undefined;
  if (typeof stack !== 'string' || stack === '' || stack === 'null') return undefined;
  return stack;
}

/**
 * Pick a stack without a mapping file: the only one, else the current one
 * Unlike taking the first row of `pulumi stack ls`, several stacks with none
 * marked current resolve to nothing, so the run skips instead of guessing
 */
export function pickDefaultStack(stacks: StackSummary[]): string | undefined {
  if (stacks.length === 1) return stacks[0].name;
  return stacks.find(stack => stack.current)?.name;
}

export function formatMissingStackGuidance(branch: string): string[] {
  return [
    '',
    'To configure this branch, please',
    "\t1) Run 'pulumi stack init <stack-name>'",
    '\t2) Associate the stack with the branch by adding',
    '\t\t{',
    `\t\t\t"${branch}": "<stack-name>"`,
    '\t\t}',
    `\tto your ${BRANCH_MAPPING_FILE} file`,
    '',
    'For now, exiting cleanly without doing anything...'
  ];
}

/**
 * Resolve the stack a branch deploys to
 * @throws SkipRunError with configuration guidance when no stack is found
 */
export async function resolveStack(options: ResolveStackOptions): Promise<string> {
  const mapping = await readBranchMapping(options.mappingFile);
  const stack = mapping
    ? lookupStack(mapping, options.branch)
    : pickDefaultStack(await options.listStacks());

  if (!stack) {
    throw new SkipRunError(
      `No stack configured for branch '${options.branch}'`,
      formatMissingStackGuidance(options.branch)
    );
  }
  return stack;
}
