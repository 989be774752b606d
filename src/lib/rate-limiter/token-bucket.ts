import { sleep } from "./backoff";

export interface TokenBucketConfig {
  /** Bucket capacity; also the burst size */
  maxTokens: number;
  refillRatePerSecond: number;
  /** Default: maxTokens */
  initialTokens?: number;
}

/**
 * One spreadsheet quota. Capacity shrinks after the API answers 429 and grows
 * back one token per request that succeeds.
 */
export interface TokenBucket {
  /** Takes one token, sleeping until a refill when empty. Resolves to the ms waited. */
  acquire: () => Promise<number>;
  available: () => number;
  penalize: (multiplier: number) => void;
  recover: () => void;
}

export const createTokenBucket = (config: TokenBucketConfig): TokenBucket => {
  const { maxTokens, refillRatePerSecond } = config;

  let capacity = maxTokens;
  let tokens = config.initialTokens ?? maxTokens;
  let refilledAt = Date.now();

  const refill = (): void => {
    const now = Date.now();
    tokens = Math.min(capacity, tokens + ((now - refilledAt) / 1000) * refillRatePerSecond);
    refilledAt = now;
  };

  const acquire = async (): Promise<number> => {
    refill();
    if (tokens >= 1) {
      tokens -= 1;
      return 0;
    }

    const waitMs = Math.ceil(((1 - tokens) / refillRatePerSecond) * 1000);
    await sleep(waitMs);
    refill();
    tokens -= 1;
    return waitMs;
  };

  return {
    acquire,
    available: () => {
      refill();
      return tokens;
    },
    penalize: (multiplier) => {
      capacity = Math.max(1, Math.floor(capacity * multiplier));
      tokens = Math.min(tokens, capacity);
    },
    recover: () => {
      capacity = Math.min(maxTokens, capacity + 1);
    },
  };
};
