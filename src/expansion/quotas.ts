/**
 * Quota arithmetic for the Quota Expander.
 */

/**
 * What quota allocation needs to know about a cluster.
 */
export interface QuotaInput {
  readonly expansionPotential: number;
  readonly memberCount: number;
}

export interface QuotaAllocation {
  /** Items per cluster, parallel to the input */
  readonly quotas: readonly number[];
  /** Items removed to bring a rounded total down to the target */
  readonly trimmed: number;
  /** Items still missing after rounding; the expander back-fills these */
  readonly shortfall: number;
}

/**
 * Allocate `target` items across clusters in sequence order.
 *
 * - Non-empty clusters get round(target × p / Σp), at least 1.
 * - With Σp = 0, target / count each, the remainder to the first clusters.
 * - Empty clusters get 0.
 * - Excess is trimmed one item at a time from trailing clusters holding
 *   more than one item, walking backwards; if that is not enough (target
 *   below the cluster count) trailing clusters drop to zero.
 */
export function allocateQuotas(clusters: readonly QuotaInput[], target: number): QuotaAllocation {
  const eligible = clusters.map((c) => c.memberCount > 0);
  const eligibleCount = eligible.filter(Boolean).length;
  if (target <= 0 || eligibleCount === 0) {
    return { quotas: clusters.map(() => 0), trimmed: 0, shortfall: Math.max(0, target) };
  }

  const totalPotential = clusters.reduce(
    (sum, c, i) => sum + (eligible[i] === true ? Math.max(0, c.expansionPotential) : 0),
    0
  );

  const quotas: number[] = [];
  if (totalPotential === 0) {
    const base = Math.floor(target / eligibleCount);
    let remainder = target % eligibleCount;
    for (let i = 0; i < clusters.length; i++) {
      if (eligible[i] !== true) {
        quotas.push(0);
        continue;
      }
      quotas.push(base + (remainder > 0 ? 1 : 0));
      if (remainder > 0) remainder--;
    }
  } else {
    clusters.forEach((c, i) => {
      quotas.push(
        eligible[i] === true
          ? Math.max(1, Math.round((target * Math.max(0, c.expansionPotential)) / totalPotential))
          : 0
      );
    });
  }

  let total = quotas.reduce((sum, q) => sum + q, 0);
  let trimmed = 0;

  // Walk backwards over clusters with more than one item
  let cursor = quotas.length - 1;
  while (total > target && quotas.some((q) => q > 1)) {
    if (cursor < 0) cursor = quotas.length - 1;
    const q = quotas[cursor] ?? 0;
    if (q > 1) {
      quotas[cursor] = q - 1;
      total--;
      trimmed++;
    }
    cursor--;
  }

  for (let i = quotas.length - 1; i >= 0 && total > target; i--) {
    const q = quotas[i] ?? 0;
    if (q > 0) {
      quotas[i] = 0;
      total -= q;
      trimmed += q;
    }
  }

  return { quotas, trimmed, shortfall: Math.max(0, target - total) };
}

/**
 * Split a cluster quota across its concepts: floor(q / m) each, the
 * remainder to the first concepts.
 */
export function distributeQuota(quota: number, conceptCount: number): number[] {
  if (conceptCount <= 0) {
    return [];
  }
  const base = Math.floor(quota / conceptCount);
  const remainder = quota % conceptCount;
  return Array.from({ length: conceptCount }, (_, i) => base + (i < remainder ? 1 : 0));
}
