/**
 * Simulated kitchen time for the PREPARING stage.
 *
 * Durations are whole seconds drawn uniformly from an inclusive range.
 * The random source and the sleep are injectable so tests stay instant.
 */

export interface PreparationDelayOptions {
  minSeconds: number;
  maxSeconds: number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type PreparationDelay = () => Promise<number>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Picks a whole number of seconds in `[minSeconds, maxSeconds]`. */
export function pickDurationSeconds(
  minSeconds: number,
  maxSeconds: number,
  random: () => number = Math.random,
): number {
  if (!Number.isInteger(minSeconds) || !Number.isInteger(maxSeconds) || minSeconds < 0) {
    throw new RangeError('Preparation bounds must be non-negative integers');
  }
  if (minSeconds > maxSeconds) {
    throw new RangeError(`Invalid preparation range: min ${minSeconds} > max ${maxSeconds}`);
  }
  return minSeconds + Math.floor(random() * (maxSeconds - minSeconds + 1));
}

/**
 * Builds the delay used by the processor. Resolves with the number of
 * seconds waited. There is no cancellation path: the wait always completes.
 */
export function randomPreparationDelay(options: PreparationDelayOptions): PreparationDelay {
  const { minSeconds, maxSeconds } = options;
  const random = options.random ?? Math.random;
  const wait = options.sleep ?? sleep;

  // Bad ranges are rejected at construction.
  pickDurationSeconds(minSeconds, maxSeconds, () => 0);

  return async () => {
    const seconds = pickDurationSeconds(minSeconds, maxSeconds, random);
    await wait(seconds * 1000);
    return seconds;
  };
}
