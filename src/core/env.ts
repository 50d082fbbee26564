/**
 * Environment variable handling
 * LOG_LEVEL and NODE_ENV are read by the logger directly.
 */

export interface EnvConfig {
  scoringPreset: string | null;
  watchlist: string | null;
  snapshotsPath: string | null;
}

function optionalTrimmed(name: string): string | null {
  const value = process.env[name]?.trim();
  return value ? value : null;
}

export function loadEnvConfig(): EnvConfig {
  return {
    scoringPreset: optionalTrimmed('SCORING_PRESET') ?? optionalTrimmed('PRESET'),
    watchlist: optionalTrimmed('WATCHLIST'),
    snapshotsPath: optionalTrimmed('SNAPSHOTS_PATH'),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
