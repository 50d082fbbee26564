/**
 * Scoring error taxonomy
 *
 * ConfigurationError is fatal: a broken table would corrupt every ticker.
 * InvalidSnapshotError is per ticker and is turned into a failed result by the engine.
 */

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[], source: string = 'scoring config') {
    super(`scoring_config_invalid (${source}): ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class InvalidSnapshotError extends Error {
  readonly ticker: string;
  readonly issues: string[];

  constructor(ticker: string, issues: string[]) {
    super(`snapshot_invalid (${ticker || 'unknown'}): ${issues.join('; ')}`);
    this.name = 'InvalidSnapshotError';
    this.ticker = ticker;
    this.issues = issues;
  }
}
