/**
 * Placement Policy
 *
 * Pure decision table: (size, profile, domain, policy version) ->
 * (strategy, confidence). Thresholds are fixed per policy version so a
 * record can be re-evaluated later under the version it was placed with or
 * under a newer one.
 *
 * Comparisons that land exactly on a threshold are evaluated both ways and
 * the cheapest resulting strategy wins (STRATEGY_COST order).
 *
 * Confidence is defined as clamp(min(1, distance / margin), 0.3, 0.99),
 * taken at the nearest threshold consulted on the decision path. For sizes
 * distance is in log10 decades and margin is sizeMarginDecades; for scores
 * distance is the absolute difference and margin is scoreMargin.
 *
 * @module services/placement/policy
 */

import {
  STRATEGY_COST,
  type ContentProfile,
  type StorageStrategy,
} from '../../models/content-record.js';
import { clamp, roundTo } from '../../utils/math.js';
import { ValidationError } from '../../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export interface PolicyThresholds {
  /** Bytes; smaller content is stored whole */
  sizeSmall: number;
  /** Bytes; high-value domains above this go hybrid */
  sizeMedium: number;
  /** Bytes; larger content is stored as vectors only */
  sizeLarge: number;
  complexityHybrid: number;
  queryPotentialHybrid: number;
  /** Density above which content gets a specialized table (null = rule off) */
  densityTable: number | null;
  highValueDomains: readonly string[];
}

/**
 * Domain-specific rule evaluated before the decision table.
 * minSize is inclusive, maxSize exclusive.
 */
export interface PolicyOverride {
  domain: string;
  minSize?: number;
  maxSize?: number;
  strategy: StorageStrategy;
  confidence: number;
}

export interface PolicyDefinition {
  version: number;
  thresholds: PolicyThresholds;
  overrides: readonly PolicyOverride[];
}

export interface PolicyMargins {
  sizeMarginDecades: number;
  scoreMargin: number;
}

export interface PlacementDecision {
  strategy: StorageStrategy;
  confidence: number;
  policy_version: number;
  /** Rule that fired: 'small_size', 'large_size', 'complex_queryable', 'dense_structured', 'high_value_domain', 'default', 'override:<domain>' */
  rule: string;
  reasoning: string[];
}

export const SIZE_SMALL = 50_000;
export const SIZE_MEDIUM = 1_000_000;
export const SIZE_LARGE = 50_000_000;
export const HIGH_VALUE_DOMAINS: readonly string[] = ['science', 'philosophy', 'literature'];

export const DEFAULT_MARGINS: PolicyMargins = {
  sizeMarginDecades: 0.5,
  scoreMargin: 0.2,
};

const VERSION_1: PolicyDefinition = {
  version: 1,
  thresholds: {
    sizeSmall: SIZE_SMALL,
    sizeMedium: SIZE_MEDIUM,
    sizeLarge: SIZE_LARGE,
    complexityHybrid: 0.7,
    queryPotentialHybrid: 0.8,
    densityTable: null,
    highValueDomains: HIGH_VALUE_DOMAINS,
  },
  overrides: [],
};

/**
 * Version 2 adds the dense-content rule: information density above 0.8
 * gets a specialized table, checked after the hybrid rule.
 */
const VERSION_2: PolicyDefinition = {
  version: 2,
  thresholds: { ...VERSION_1.thresholds, densityTable: 0.8 },
  overrides: [],
};

export const POLICY_VERSIONS: ReadonlyMap<number, PolicyDefinition> = new Map([
  [1, VERSION_1],
  [2, VERSION_2],
]);

export const LATEST_POLICY_VERSION = 2;
export const CONFIDENCE_FLOOR = 0.3;
export const CONFIDENCE_CEILING = 0.99;

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════════════════════

interface Comparison {
  label: string;
  /** Normalized distance to the threshold (0 when tied) */
  distance: number;
  tied: boolean;
  /** Outcome when not tied */
  result: boolean;
}

interface Outcome {
  strategy: StorageStrategy;
  rule: string;
  consulted: Comparison[];
  /** Tied comparisons met on the path */
  ties: number;
}

/**
 * Walk the decision table. `tieChoice` supplies the branch for each tied
 * comparison, in the order they are consulted.
 */
function walkTable(
  comparisons: {
    small: Comparison;
    large: Comparison;
    complexity: Comparison;
    queryPotential: Comparison;
    density: Comparison | null;
    medium: Comparison;
  },
  highValue: boolean,
  tieChoice: (index: number) => boolean
): Outcome {
  const consulted: Comparison[] = [];
  let ties = 0;
  const test = (c: Comparison): boolean => {
    consulted.push(c);
    return c.tied ? tieChoice(ties++) : c.result;
  };
  const done = (strategy: StorageStrategy, rule: string): Outcome => ({
    strategy,
    rule,
    consulted,
    ties,
  });

  if (test(comparisons.small)) return done('full_store', 'small_size');
  if (test(comparisons.large)) return done('vector_store', 'large_size');
  if (test(comparisons.complexity) && test(comparisons.queryPotential)) {
    return done('hybrid', 'complex_queryable');
  }
  if (comparisons.density && test(comparisons.density)) {
    return done('specialized_table', 'dense_structured');
  }
  if (highValue && test(comparisons.medium)) {
    return done('hybrid', 'high_value_domain');
  }
  return done('metadata_only', 'default');
}

function sizeComparison(
  label: string,
  size: number,
  threshold: number,
  below: boolean,
  margins: PolicyMargins
): Comparison {
  const decades = Math.abs(Math.log10(Math.max(size, 1)) - Math.log10(Math.max(threshold, 1)));
  return {
    label,
    distance: decades / margins.sizeMarginDecades,
    tied: size === threshold,
    result: below ? size < threshold : size > threshold,
  };
}

function scoreComparison(
  label: string,
  value: number,
  threshold: number,
  margins: PolicyMargins
): Comparison {
  return {
    label,
    distance: Math.abs(value - threshold) / margins.scoreMargin,
    tied: value === threshold,
    result: value > threshold,
  };
}

function confidenceFor(consulted: Comparison[]): number {
  let nearest = 1;
  for (const c of consulted) {
    if (c.distance < nearest) nearest = c.distance;
  }
  return roundTo(clamp(Math.min(1, nearest), CONFIDENCE_FLOOR, CONFIDENCE_CEILING));
}

function validateDecisionInput(size: number, profile: ContentProfile, domain: string): void {
  if (!Number.isFinite(size) || size < 0) {
    throw new ValidationError(`size must be a non-negative number, got ${size}`);
  }
  for (const [key, value] of Object.entries(profile)) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
      throw new ValidationError(`profile.${key} must be in [0, 1], got ${String(value)}`);
    }
  }
  if (domain.length === 0) {
    throw new ValidationError('domain is required');
  }
}

function overrideMatches(override: PolicyOverride, domain: string, size: number): boolean {
  if (override.domain !== domain) return false;
  if (override.minSize !== undefined && size < override.minSize) return false;
  if (override.maxSize !== undefined && size >= override.maxSize) return false;
  return true;
}

// ═══════════════════════════════════════════════════════════════════════════════
// POLICY
// ═══════════════════════════════════════════════════════════════════════════════

export interface PlacementPolicyOptions {
  /** Extra overrides applied under every version, ahead of the version's own */
  overrides?: readonly PolicyOverride[];
  margins?: Partial<PolicyMargins>;
  versions?: ReadonlyMap<number, PolicyDefinition>;
}

export class PlacementPolicy {
  private readonly overrides: readonly PolicyOverride[];
  private readonly margins: PolicyMargins;
  private readonly versions: ReadonlyMap<number, PolicyDefinition>;

  constructor(options: PlacementPolicyOptions = {}) {
    this.overrides = options.overrides ?? [];
    this.margins = { ...DEFAULT_MARGINS, ...options.margins };
    this.versions = options.versions ?? POLICY_VERSIONS;
    if (this.margins.sizeMarginDecades <= 0 || this.margins.scoreMargin <= 0) {
      throw new ValidationError('policy margins must be positive');
    }
  }

  hasVersion(version: number): boolean {
    return this.versions.has(version);
  }

  /**
   * Decide the storage strategy.
   *
   * @throws ValidationError on an unknown policy version or malformed input
   */
  decide(
    size: number,
    profile: ContentProfile,
    domain: string,
    policyVersion: number
  ): PlacementDecision {
    const definition = this.versions.get(policyVersion);
    if (!definition) {
      throw new ValidationError(`Unknown policy version ${policyVersion}`);
    }
    validateDecisionInput(size, profile, domain);

    for (const override of [...this.overrides, ...definition.overrides]) {
      if (overrideMatches(override, domain, size)) {
        return {
          strategy: override.strategy,
          confidence: roundTo(clamp(override.confidence, CONFIDENCE_FLOOR, CONFIDENCE_CEILING)),
          policy_version: policyVersion,
          rule: `override:${domain}`,
          reasoning: [`Domain override for ${domain} selects ${override.strategy}`],
        };
      }
    }

    const t = definition.thresholds;
    const m = this.margins;
    const comparisons = {
      small: sizeComparison('size < sizeSmall', size, t.sizeSmall, true, m),
      large: sizeComparison('size > sizeLarge', size, t.sizeLarge, false, m),
      complexity: scoreComparison('semantic_complexity > complexityHybrid', profile.semantic_complexity, t.complexityHybrid, m),
      queryPotential: scoreComparison('query_potential > queryPotentialHybrid', profile.query_potential, t.queryPotentialHybrid, m),
      density:
        t.densityTable === null
          ? null
          : scoreComparison('information_density > densityTable', profile.information_density, t.densityTable, m),
      medium: sizeComparison('size > sizeMedium', size, t.sizeMedium, false, m),
    };
    const highValue = t.highValueDomains.includes(domain);

    // Enumerate both branches of every tied comparison on the path
    const explore = (choices: boolean[]): Outcome => {
      const outcome = walkTable(comparisons, highValue, (index) =>
        index < choices.length ? choices[index] : false
      );
      if (outcome.ties <= choices.length) return outcome;
      const taken = explore([...choices, true]);
      const skipped = explore([...choices, false]);
      return STRATEGY_COST[skipped.strategy] < STRATEGY_COST[taken.strategy] ? skipped : taken;
    };

    const chosen = explore([]);
    const reasoning = chosen.consulted.map((c) =>
      c.tied ? `${c.label}: tied at threshold` : `${c.label}: ${c.result}`
    );
    reasoning.push(`rule ${chosen.rule} selects ${chosen.strategy}`);

    return {
      strategy: chosen.strategy,
      confidence: confidenceFor(chosen.consulted),
      policy_version: policyVersion,
      rule: chosen.rule,
      reasoning,
    };
  }
}

const defaultPolicy = new PlacementPolicy();

/**
 * decide() under the built-in policy versions with no extra overrides
 */
export function decide(
  size: number,
  profile: ContentProfile,
  domain: string,
  policyVersion: number
): PlacementDecision {
  return defaultPolicy.decide(size, profile, domain, policyVersion);
}
