import * as dotenv from 'dotenv';

dotenv.config();

export interface Settings {
  debug: boolean;
  unsetToken: string;
}

function envFlag(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized !== '' && normalized !== '0' && normalized !== 'false';
}

/**
 * Resolution order:
 * 1. command-line flag
 * 2. EXTRACT_STATS_* environment variable (a .env file in the working directory is loaded first)
 * 3. built-in default
 */
export function resolveSettings(flags: { debug?: boolean; unset?: string } = {}): Settings {
  return {
    debug: flags.debug ?? envFlag(process.env.EXTRACT_STATS_DEBUG),
    unsetToken: flags.unset ?? process.env.EXTRACT_STATS_UNSET ?? '',
  };
}
