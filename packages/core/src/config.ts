/**
 * Library options
 */

export interface TrieConfig {
  /**
   * Check after every public merge that the one-sided transforms returned
   * no key missing from their input. Costs a lookup per returned entry.
   */
  readonly verifyMergeContract: boolean;
}

const DEFAULT_CONFIG: TrieConfig = Object.freeze({ verifyMergeContract: false });

let current: TrieConfig = DEFAULT_CONFIG;

export function getConfig(): TrieConfig {
  return current;
}

export function configure(options: Partial<TrieConfig>): TrieConfig {
  const { verifyMergeContract = current.verifyMergeContract } = options;
  if (typeof verifyMergeContract !== 'boolean') {
    throw new TypeError('verifyMergeContract must be a boolean');
  }
  current = Object.freeze({ verifyMergeContract });
  return current;
}

export function resetConfig(): TrieConfig {
  current = DEFAULT_CONFIG;
  return current;
}
