#!/usr/bin/env node
/**
 * Entrypoint executable
 * Called as the container entrypoint with the Pulumi arguments, e.g.
 * `pulumi-ci-entrypoint preview --non-interactive`
 */

import { loadEntrypointConfig } from '../shared/config.js';
import { Entrypoint, exitCodeForError } from './index.js';

async function main(): Promise<number> {
  try {
    const config = loadEntrypointConfig(process.env, process.argv.slice(2));
    const result = await new Entrypoint(config).run();
    return result.exitCode;
  } catch (error) {
    return exitCodeForError(error);
  }
}

main()
  .then(exitCode => process.exit(exitCode))
  .catch(error => {
    console.error('Entrypoint failed:', error);
    process.exit(1);
  });
