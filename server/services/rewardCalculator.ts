import Decimal from "decimal.js";

export interface RewardPolicy {
  baseRate: Decimal;
  cap: Decimal;
}

export const DEFAULT_REWARD_POLICY: RewardPolicy = {
  baseRate: new Decimal("500.00"),
  cap: new Decimal("10000.00"),
};

export function rewardPolicy(baseRate: string, cap: string): RewardPolicy {
  return { baseRate: new Decimal(baseRate), cap: new Decimal(cap) };
}

/**
 * Converts an efficiency score into a reward amount: `baseRate * score`,
 * rounded half-up to cents, capped at `cap`. The score enters decimal
 * arithmetic through its shortest decimal representation, so 1.536 is
 * multiplied as exactly 1.536.
 */
export function calculateReward(
  efficiencyScore: number,
  policy: RewardPolicy = DEFAULT_REWARD_POLICY
): Decimal {
  if (!Number.isFinite(efficiencyScore) || efficiencyScore < 0) {
    throw new RangeError(`Efficiency score must be a non-negative finite number, got ${efficiencyScore}`);
  }

  const raw = policy.baseRate
    .times(new Decimal(efficiencyScore))
    .toDecimalPlaces(2, Decimal.ROUND_HALF_UP);

  return Decimal.min(raw, policy.cap);
}

export function formatAmount(amount: Decimal): string {
  return amount.toFixed(2);
}
