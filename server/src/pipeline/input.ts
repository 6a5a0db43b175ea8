import fs from 'fs/promises';
import path from 'path';
import { ConfigError } from '../errors.js';
import type { ParticipantRow } from '../types.js';

/**
 * Read participant rows from a JSON array file. Only home_organization is
 * consumed; rows without it still count as rows but contribute no name.
 */
export async function readParticipantRows(filePath: string): Promise<ParticipantRow[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read input file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new ConfigError(`${filePath} must contain a JSON array of participant rows`);
  }

  return parsed.map((row): ParticipantRow => {
    if (typeof row !== 'object' || row === null) {
      return {};
    }
    const organization = 'home_organization' in row ? row.home_organization : undefined;
    const source = 'source' in row ? row.source : undefined;
    return {
      home_organization: typeof organization === 'string' ? organization : null,
      source: typeof source === 'string' ? source : undefined,
    };
  });
}

export function organizationNames(rows: ParticipantRow[]): Array<string | null | undefined> {
  return rows.map((row) => row.home_organization);
}

/** Raw name to canonical name export, written next to the registry */
export async function writeMapping(outputDir: string, mapping: Map<string, string>): Promise<string> {
  const filePath = path.join(outputDir, 'mapping.json');
  await fs.mkdir(outputDir, { recursive: true });
  const sorted = [...mapping].sort(([a], [b]) => a.localeCompare(b));
  await fs.writeFile(filePath, JSON.stringify(Object.fromEntries(sorted), null, 2), 'utf-8');
  return filePath;
}
