/**
 * Environment variable validation
 *
 * Checks the variables a run mode needs before anything starts and
 * fills in defaults for the optional ones.
 */

import { createLogger } from './logger.js';

const logger = createLogger('env-validation');

export type RunMode = 'batch' | 'http';

interface EnvVariable {
  name: string;
  description: string;
  defaultValue?: string;
  modes?: RunMode[];
}

interface EnvConfig {
  required: EnvVariable[];
  optional: EnvVariable[];
}

const envConfig: EnvConfig = {
  required: [
    {
      name: 'ANTHROPIC_API_KEY',
      description: 'Anthropic API key used by the sector classifier',
      modes: ['batch'],
    },
  ],
  optional: [
    { name: 'MODE', description: 'Run mode (batch|http)', defaultValue: 'batch' },
    { name: 'INPUT_FILE', description: 'JSON array of participant rows', defaultValue: 'input/participants.json', modes: ['batch'] },
    { name: 'OUTPUT_DIR', description: 'Directory for the registry/ and cache/ record files and mapping.json', defaultValue: 'output' },
    { name: 'PORT', description: 'HTTP server port', defaultValue: '3000', modes: ['http'] },
    { name: 'NODE_ENV', description: 'Environment (development|production)', defaultValue: 'development' },
    { name: 'DATABASE_URL', description: 'PostgreSQL connection string; JSON files are used when unset' },
    { name: 'GOOGLE_API_KEY', description: 'Google Custom Search API key (google backend is skipped without it)', modes: ['batch'] },
    { name: 'GOOGLE_SEARCH_ENGINE_ID', description: 'Google Programmable Search engine id', modes: ['batch'] },
    { name: 'SEARCH_ORDER', description: 'Comma-separated search backends', defaultValue: 'google,duckduckgo,bing' },
    { name: 'SEARCH_MAX_ATTEMPTS', description: 'Attempts per search backend on rate limits and server errors', defaultValue: '3' },
    { name: 'WORKER_COUNT', description: 'Organizations processed concurrently', defaultValue: '4' },
    { name: 'CACHE_MAX_AGE_DAYS', description: 'Days before a cached result is refreshed', defaultValue: '30' },
  ],
};

function appliesTo(variable: EnvVariable, mode: RunMode): boolean {
  return !variable.modes || variable.modes.includes(mode);
}

/**
 * Validate environment for the given mode.
 * Returns false when a required variable is missing; the caller decides how to exit.
 */
export function validateEnvironment(mode: RunMode, env: NodeJS.ProcessEnv = process.env): boolean {
  const missing: string[] = [];
  const warnings: string[] = [];

  for (const variable of envConfig.required) {
    if (appliesTo(variable, mode) && !env[variable.name]) {
      missing.push(`${variable.name}: ${variable.description}`);
    }
  }

  for (const variable of envConfig.optional) {
    if (!appliesTo(variable, mode) || env[variable.name]) continue;
    if (variable.defaultValue) {
      env[variable.name] = variable.defaultValue;
    } else {
      warnings.push(`${variable.name}: ${variable.description}`);
    }
  }

  if (warnings.length > 0) {
    logger.warn({ mode, unset: warnings }, 'Optional environment variables not set');
  }

  if (missing.length > 0) {
    logger.error({ mode, missing }, 'Missing required environment variables');
    return false;
  }

  return true;
}

export function getEnvironmentDocs(): string {
  let docs = '# Required Environment Variables\n\n';

  for (const { name, description, modes } of envConfig.required) {
    const scope = modes ? ` [${modes.join(', ')}]` : '';
    docs += `${name}=${description}${scope}\n`;
  }

  docs += '\n# Optional Environment Variables\n\n';

  for (const { name, description, defaultValue } of envConfig.optional) {
    const defaultText = defaultValue ? ` (default: ${defaultValue})` : '';
    docs += `${name}=${description}${defaultText}\n`;
  }

  return docs;
}
