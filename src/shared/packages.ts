import * as exec from '@actions/exec';
import fs from 'fs-extra';
import path from 'path';
import { CommandFailedError } from './errors.js';
import { buildEnv } from './pulumi.js';

async function isDirectory(target: string): Promise<boolean> {
  if (!(await fs.pathExists(target))) return false;
  const stat = await fs.stat(target);
  return stat.isDirectory();
}

/**
 * Install Node dependencies if the project has a manifest but no node_modules yet
 * @param cwd - Pulumi project directory
 * @param env - Extra environment variables for npm
 * @returns true if `npm install` ran
 */
export async function ensureDependencies(
  cwd: string,
  env: Record<string, string> = {}
): Promise<boolean> {
  const hasManifest = await fs.pathExists(path.join(cwd, 'package.json'));
  if (!hasManifest || (await isDirectory(path.join(cwd, 'node_modules')))) {
    return false;
  }

  const exitCode = await exec.exec('npm', ['install'], {
    cwd,
    env: buildEnv(process.env, env),
    ignoreReturnCode: true
  });
  if (exitCode !== 0) {
    throw new CommandFailedError('npm install', exitCode);
  }
  return true;
}
