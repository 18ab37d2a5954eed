/**
 * GitHub API client wrapper
 * Posts the Pulumi output back to pull requests
 */

import { getOctokit } from '@actions/github';
import { errorMessage } from './errors.js';

export interface CommentPoster {
  createComment(commentsUrl: string, body: string): Promise<void>;
}

/**
 * Format the PR comment for a command and its output
 * Trailing newlines of the output are dropped so the fence closes right after it
 */
export function formatComment(command: string, output: string): string {
  return [
    `#### :tropical_drink: \`${command}\``,
    '```',
    output.replace(/\n+$/, ''),
    '```'
  ].join('\n');
}

/**
 * GitHub API client for PR comments
 */
export class GitHubClient implements CommentPoster {
  private octokit: ReturnType<typeof getOctokit>;

  /**
   * @param token - GitHub token (PAT or GITHUB_TOKEN)
   */
  constructor(token: string) {
    this.octokit = getOctokit(token);
  }

  /**
   * Create a comment through the `comments_url` taken from the event payload
   * @param commentsUrl - Absolute issue comments endpoint
   * @param body - Markdown comment body
   */
  async createComment(commentsUrl: string, body: string): Promise<void> {
    try {
      await this.octokit.request(`POST ${commentsUrl}`, { body });
    } catch (error) {
      throw new Error(`Failed to comment on ${commentsUrl}: ${errorMessage(error)}`);
    }
  }
}
