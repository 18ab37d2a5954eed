/**
 * GitHub event payload access
 */

import fs from 'fs-extra';
import { ConfigurationError, errorMessage } from './errors.js';

export type EventPayload = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load the event payload written by the CI system
 * @param eventPath - Value of GITHUB_EVENT_PATH
 * @returns Parsed payload object
 */
export async function readEventPayload(eventPath: string): Promise<EventPayload> {
  let payload: unknown;
  try {
    payload = await fs.readJson(eventPath);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read event payload ${eventPath}: ${errorMessage(error)}`
    );
  }

  if (!isRecord(payload)) {
    throw new ConfigurationError(`Event payload ${eventPath} is not a JSON object`);
  }
  return payload;
}

/**
 * Walk a dotted path (e.g. `pull_request.base.ref`) into the payload
 */
export function getField(payload: EventPayload, fieldPath: string): unknown {
  let current: unknown = payload;
  for (const key of fieldPath.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * Read a payload field as raw text
 * Missing and null fields read as the literal `null`, numbers and booleans are
 * stringified, objects are serialized
 */
export function getString(payload: EventPayload, fieldPath: string): string {
  const value = getField(payload, fieldPath);
  if (value === undefined || value === null) return 'null';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Like getString, but absent fields come back as undefined
 */
export function getOptionalString(payload: EventPayload, fieldPath: string): string | undefined {
  const value = getString(payload, fieldPath);
  return value === 'null' ? undefined : value;
}

/**
 * Turn `refs/heads/feature/x` into `feature/x`
 */
export function stripHeadsPrefix(ref: string): string {
  return ref.replace(/refs\/heads\//g, '');
}
