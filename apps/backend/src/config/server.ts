/**
 * Sync server configuration.
 * Read from the environment (dotenv is loaded by the entry point) and
 * validated in one pass. Misconfiguration fails start-up with every
 * violation listed so operators can fix everything at once.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { LocationEntrySchema, type LocationDefinition } from '@mapsync/shared';

export interface ServerConfig {
  port: number;
  socketPath: string;
  /** How long an empty room keeps its scene before it is discarded */
  roomDrainGraceMs: number;
  /** Render flush interval handed to clients in the scene config */
  updateThrottleMs: number;
  maxMembersPerRoom: number;
  corsOrigin?: string;
  /** Directory for sync-log.jsonl; diagnostics stay in memory when unset */
  logStorePath?: string;
  /** Custom named locations layered over the built-in table */
  customLocations: Record<string, LocationDefinition>;
}

export class ConfigError extends Error {
  public readonly violations: string[];
  constructor(violations: string[]) {
    const header = `Server config is invalid (${violations.length} violation(s)):`;
    const body = violations.map((v, i) => `  ${i + 1}. ${v}`).join('\n');
    super(`${header}\n${body}`);
    this.name = 'ConfigError';
    this.violations = violations;
  }
}

const intFromEnv = (fallback: number, min: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v === undefined || v === '' ? String(fallback) : v))
    .pipe(z.coerce.number().int().min(min));

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v === undefined || v === '' ? undefined : v));

const EnvSchema = z.object({
  PORT: intFromEnv(4000, 1).pipe(z.number().max(65_535)),
  SOCKET_PATH: optionalString.pipe(
    z.string().startsWith('/', 'must start with "/"').default('/socket'),
  ),
  ROOM_DRAIN_GRACE_MS: intFromEnv(30_000, 0),
  UPDATE_THROTTLE_MS: intFromEnv(50, 0),
  MAX_MEMBERS_PER_ROOM: intFromEnv(500, 1),
  CORS_ORIGIN: optionalString,
  LOG_STORE_PATH: optionalString,
  LOCATIONS_PATH: optionalString,
});

const CustomLocationsSchema = z.record(LocationEntrySchema);

function loadCustomLocations(path: string, violations: string[]): Record<string, LocationDefinition> {
  const full = resolve(process.cwd(), path);
  if (!existsSync(full)) {
    violations.push(`LOCATIONS_PATH: file not found at ${full}`);
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(full, 'utf-8'));
  } catch (err) {
    violations.push(`LOCATIONS_PATH: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
  const parsed = CustomLocationsSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      violations.push(`LOCATIONS_PATH: ${issue.path.join('.') || '(root)'} ${issue.message}`);
    }
    return {};
  }
  return parsed.data;
}

/**
 * Build the server config from an environment map.
 * Throws ConfigError listing all problems found.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const violations: string[] = [];
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      violations.push(`${issue.path.join('.')}: ${issue.message}`);
    }
    throw new ConfigError(violations);
  }

  const data = parsed.data;
  const customLocations = data.LOCATIONS_PATH ? loadCustomLocations(data.LOCATIONS_PATH, violations) : {};
  if (violations.length > 0) throw new ConfigError(violations);

  return {
    port: data.PORT,
    socketPath: data.SOCKET_PATH,
    roomDrainGraceMs: data.ROOM_DRAIN_GRACE_MS,
    updateThrottleMs: data.UPDATE_THROTTLE_MS,
    maxMembersPerRoom: data.MAX_MEMBERS_PER_ROOM,
    corsOrigin: data.CORS_ORIGIN,
    logStorePath: data.LOG_STORE_PATH,
    customLocations,
  };
}
