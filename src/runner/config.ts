/**
 * Global configuration for the checker, including the TRIALS environment
 * variable.
 */

/** Default number of trials per check. */
export const defaultTrials = 100;

/** Default number of simplifications the shrinker tries on each value. */
export const defaultAttempts = 10;

/** Default number of counterexamples shown when a check fails a test. */
export const defaultExamples = 5;

/** A scale factor for trial counts, read from TRIALS. */
export type TrialsConfig = {
  /** 0.05 for "5%", 5 for "5x". */
  multiplier: number;
};

const trialsPattern = /^(\d+(?:\.\d+)?|\.\d+)(%|x)$/;

/**
 * Parses a TRIALS value: a percentage of the baseline ("5%"), a multiple of
 * it ("5x"), or "0" to skip trials.
 *
 * Returns undefined if the value doesn't have one of these forms.
 */
export function parseTrials(value: string): TrialsConfig | undefined {
  const trimmed = value.trim();
  if (trimmed === "0") {
    return { multiplier: 0 };
  }
  const match = trialsPattern.exec(trimmed);
  if (match === null) {
    return undefined;
  }
  const n = Number(match[1]);
  return { multiplier: match[2] === "%" ? n / 100 : n };
}

/**
 * Reads TRIALS from the environment.
 *
 * @throws if TRIALS is set to something that {@link parseTrials} rejects.
 */
export function readTrialsEnv(
  env: Record<string, string | undefined>,
): TrialsConfig | undefined {
  const envVal = env.TRIALS;
  if (envVal === undefined || envVal === "") {
    return undefined;
  }

  const config = parseTrials(envVal);
  if (config === undefined) {
    throw new Error(
      `Invalid TRIALS value: "${envVal}". ` +
        `Use percentage (e.g., "5%") or multiplier (e.g., "5x") format.`,
    );
  }
  return config;
}

/**
 * Cached TRIALS configuration, read on first use.
 * - null: not read yet
 * - undefined: TRIALS not set
 */
let trialsConfigFromEnv: TrialsConfig | undefined | null = null;

/**
 * Set by tests; wins over the environment when not null.
 */
let trialsConfigOverride: TrialsConfig | undefined | null = null;

/**
 * Returns the TRIALS environment variable configuration.
 *
 * - `TRIALS=5%` - Run 5% of the baseline trials
 * - `TRIALS=5x` - Run 5× the baseline trials
 * - `TRIALS=100%` or `TRIALS=1x` - Same as not setting TRIALS
 */
export function getTrials(): TrialsConfig | undefined {
  if (trialsConfigOverride !== null) {
    return trialsConfigOverride;
  }
  if (trialsConfigFromEnv === null) {
    trialsConfigFromEnv = readTrialsEnv(process.env);
  }
  return trialsConfigFromEnv;
}

/**
 * Sets an override for the TRIALS configuration.
 *
 * @param config the config to use, undefined to ignore TRIALS, or null to
 * clear the override.
 */
export function setTrialsForTesting(
  config: TrialsConfig | undefined | null,
): void {
  trialsConfigOverride = config;
}

/**
 * Returns how many trials to run, given the baseline from the caller.
 */
export function scaleTrials(baseline: number): number {
  const config = getTrials();
  if (config === undefined) {
    return baseline;
  }
  return Math.ceil(baseline * config.multiplier);
}
