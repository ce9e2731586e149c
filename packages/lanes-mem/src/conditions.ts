/**
 * Artificial network conditions applied to packets crossing a memory link.
 * For tests only: inducing loss, duplication and delay shows how a session
 * copes with an unreliable path.
 */
export interface LinkConditions {
  /**
   * Chance of a packet being dropped, `0..1`. Values outside are clamped.
   * @default 0
   */
  lossRate?: number;

  /**
   * Chance of a delivered packet arriving twice, `0..1`.
   * @default 0
   */
  duplicateRate?: number;

  /**
   * Mean delivery delay in milliseconds. `0` delivers on the next microtask.
   * @default 0
   */
  delayMean?: number;

  /**
   * Each delay is drawn uniformly from `delayMean ± delayJitter`, and never
   * below zero. Packets whose delays differ may arrive out of order.
   * @default 0
   */
  delayJitter?: number;

  /**
   * Source of randomness in `[0, 1)`. Pass a seeded generator for repeatable
   * runs.
   * @default Math.random
   */
  random?: () => number;
}

const defaultConditions: Required<LinkConditions> = {
  lossRate: 0,
  duplicateRate: 0,
  delayMean: 0,
  delayJitter: 0,
  random: Math.random,
};

function clampRate(rate: number): number {
  return Number.isNaN(rate) ? 0 : Math.min(1, Math.max(0, rate));
}

/** Merges `conditions` over the defaults. */
export function resolveConditions(conditions?: LinkConditions): Required<LinkConditions> {
  const merged = { ...defaultConditions, ...conditions };
  return {
    ...merged,
    lossRate: clampRate(merged.lossRate),
    duplicateRate: clampRate(merged.duplicateRate),
    delayMean: Math.max(0, merged.delayMean),
    delayJitter: Math.max(0, merged.delayJitter),
  };
}

/**
 * Decides the fate of one packet: the delays of its deliveries, in
 * milliseconds. Empty when the packet is dropped; two entries when it is
 * duplicated.
 */
export function scheduleDeliveries(conditions: Required<LinkConditions>): number[] {
  const { random } = conditions;
  if (random() < conditions.lossRate) return [];
  const drawDelay = (): number =>
    Math.max(0, conditions.delayMean + (random() * 2 - 1) * conditions.delayJitter);
  const delays = [drawDelay()];
  if (random() < conditions.duplicateRate) delays.push(drawDelay());
  return delays;
}
