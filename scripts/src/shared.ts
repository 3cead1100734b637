/**
 * Helpers shared by the CLI scripts
 */

import { config as loadDotenv } from 'dotenv';
import { validateEnv } from '@hr-assistant/lib';

/**
 * Load `.env.local` then `.env`; values already in the environment win
 */
export function loadEnvironment(): void {
  loadDotenv({ path: ['.env.local', '.env'] });
}

export function printBanner(title: string): void {
  console.log('='.repeat(60));
  console.log(title);
  console.log('='.repeat(60));
  console.log('');
}

/**
 * Exit with a readable report when required variables are missing or invalid
 */
export function requireValidEnv(options?: { requireScraper?: boolean }): void {
  const validation = validateEnv(process.env, options);
  if (validation.isValid) {
    return;
  }

  console.error('ERROR: Environment configuration is invalid.');

  if (validation.missingVars.length > 0) {
    console.error('');
    console.error('Missing environment variables:');
    for (const name of validation.missingVars) {
      console.error(`  - ${name}`);
    }
  }

  if (validation.errors.length > 0) {
    console.error('');
    console.error('Configuration errors:');
    for (const error of validation.errors) {
      console.error(`  - ${error}`);
    }
  }

  console.error('');
  console.error('Set them in .env.local or .env, for example:');
  console.error('');
  console.error('  OPENAI_API_KEY=<your-openai-key>');
  console.error('  QDRANT_URL=http://localhost:6333');
  if (options?.requireScraper) {
    console.error('  FIRECRAWL_API_KEY=<your-firecrawl-key>');
  }
  console.error('');
  process.exit(1);
}

export interface ParsedFlags {
  positional: string[];
  flags: Map<string, string | true>;
}

/**
 * Parse `--name`, `--name=value` and `--name value` flags
 */
export function parseFlags(args: readonly string[], valueFlags: readonly string[] = []): ParsedFlags {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    if (eq !== -1) {
      flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      continue;
    }

    const name = arg.slice(2);
    const next = args[i + 1];
    if (valueFlags.includes(name) && next !== undefined && !next.startsWith('--')) {
      flags.set(name, next);
      i++;
    } else {
      flags.set(name, true);
    }
  }

  return { positional, flags };
}
