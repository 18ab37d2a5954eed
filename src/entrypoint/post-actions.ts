/**
 * Post actions run after the wrapped Pulumi command, keyed by GitHub event name
 */

import * as core from '@actions/core';
import { getOptionalString, getString, stripHeadsPrefix, type EventPayload } from '../shared/event.js';
import { formatComment, type CommentPoster } from '../shared/github.js';
import type { PulumiOperations } from '../shared/pulumi.js';
import { lookupStack, readBranchMapping } from '../shared/stacks.js';

export type PostActionResult =
  | { kind: 'comment'; prNumber: string; url: string }
  | { kind: 'flag'; branch: string; update: false }
  | { kind: 'remove'; branch: string; stack: string }
  | { kind: 'skipped'; reason: string }
  | { kind: 'failed'; error: string }
  | { kind: 'none' };

export interface PostActionContext {
  eventName?: string;
  loadPayload: () => Promise<EventPayload>;
  // Wrapped command line and its captured output
  command: string;
  output: string;
  token?: string;
  removeStackOnDelete: boolean;
  mappingFile: string;
  createGitHubClient: (token: string) => CommentPoster;
  pulumi: Pick<PulumiOperations, 'removeStack'>;
}

async function commentOnPullRequest(context: PostActionContext): Promise<PostActionResult> {
  const payload = await context.loadPayload();
  const action = getString(payload, 'action');
  const prNumber = getString(payload, 'number');
  const branch = getString(payload, 'pull_request.head.ref');
  const commentsUrl = getOptionalString(payload, 'pull_request.comments_url');
  core.info(`# PR #${prNumber}, action '${action}', branch ${branch}`);

  if (!commentsUrl) {
    core.warning(`PR #${prNumber} payload has no comments_url, not commenting`);
    return { kind: 'skipped', reason: 'missing comments_url' };
  }
  if (!context.token) {
    core.warning('GITHUB_TOKEN is not set, not commenting on the PR');
    return { kind: 'skipped', reason: 'missing GITHUB_TOKEN' };
  }

  core.info(`Commenting on PR ${commentsUrl}`);
  const client = context.createGitHubClient(context.token);
  await client.createComment(commentsUrl, formatComment(context.command, context.output));
  return { kind: 'comment', prNumber, url: commentsUrl };
}

async function handleBranchDeletion(context: PostActionContext): Promise<PostActionResult> {
  const payload = await context.loadPayload();
  const branch = stripHeadsPrefix(getString(payload, 'ref'));
  // Deleted branches never get stack updates
  core.info(`Branch ${branch} was deleted, stack updates are disabled for it`);

  if (!context.removeStackOnDelete) {
    return { kind: 'flag', branch, update: false };
  }

  // Only stacks explicitly mapped to the branch are ever removed
  const mapping = await readBranchMapping(context.mappingFile);
  const stack = mapping ? lookupStack(mapping, branch) : undefined;
  if (!stack) {
    core.info(`No stack mapped to deleted branch ${branch}, nothing to remove`);
    return { kind: 'flag', branch, update: false };
  }

  core.info(`Removing stack ${stack} of deleted branch ${branch}`);
  await context.pulumi.removeStack(stack);
  return { kind: 'remove', branch, stack };
}

async function handlePush(context: PostActionContext): Promise<PostActionResult> {
  const payload = await context.loadPayload();
  const branch = stripHeadsPrefix(getString(payload, 'ref'));
  return { kind: 'flag', branch, update: false };
}

/**
 * Dispatch the post action for the triggering event
 * @param context - Event, command output and clients
 * @returns What was done
 */
export async function dispatchPostAction(context: PostActionContext): Promise<PostActionResult> {
  switch (context.eventName) {
    case 'pull_request':
      return commentOnPullRequest(context);
    case 'delete':
      return handleBranchDeletion(context);
    case 'push':
      return handlePush(context);
    default:
      return { kind: 'none' };
  }
}
