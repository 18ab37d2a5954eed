/**
 * CI context detection
 * Works out which CI system we run under and which branch the run targets
 */

import type { EntrypointConfig } from './config.js';
import { SkipRunError } from './errors.js';
import { getString, stripHeadsPrefix, type EventPayload } from './event.js';

// Only these PR actions change code; assignment/label churn does not warrant a preview
export const PREVIEW_ACTIONS: readonly string[] = ['opened', 'edited', 'synchronize'];

export type CiSystem = 'GitHub';

export interface CiContext {
  system?: CiSystem;
  branch?: string;
  // Extra variables handed to every Pulumi/npm subprocess
  env: Record<string, string>;
}

/**
 * Detect the CI context
 * @param config - Entrypoint config
 * @param loadPayload - Reads the event payload (only called in PR mode)
 * @returns Context with the target branch, if one could be determined
 * @throws SkipRunError for PR actions that carry no changes
 */
export async function detectCiContext(
  config: EntrypointConfig,
  loadPayload: () => Promise<EventPayload>
): Promise<CiContext> {
  if (!config.ciMode || !config.github.workflow) {
    return { env: {} };
  }

  const env: Record<string, string> = {
    PULUMI_CI_SYSTEM: 'GitHub',
    PULUMI_CI_BUILD_ID: '',
    PULUMI_CI_BUILD_TYPE: '',
    PULUMI_CI_BUILD_URL: '',
    PULUMI_CI_PULL_REQUEST_SHA: config.github.sha ?? ''
  };

  let branch: string;
  if (config.ciMode === 'pr') {
    const payload = await loadPayload();
    const action = getString(payload, 'action');
    if (!PREVIEW_ACTIONS.includes(action)) {
      throw new SkipRunError(
        `PR event (${action}) contains no changes and does not warrant a Pulumi Preview`,
        ['Skipping Pulumi action altogether...']
      );
    }
    // Preview against the branch the PR merges into
    branch = getString(payload, 'pull_request.base.ref');
  } else {
    branch = config.github.ref ?? '';
  }

  branch = stripHeadsPrefix(branch);
  return { system: 'GitHub', branch: branch || undefined, env };
}
