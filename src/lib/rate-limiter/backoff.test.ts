import {
  CONFLICT_BACKOFF_CONFIG,
  DEFAULT_BACKOFF_CONFIG,
  RATE_LIMIT_BACKOFF_CONFIG,
  calculateBackoffMs,
  getStatusCode,
  isRetryableError,
  isRetryableStatusCode,
  parseRetryAfterMs,
} from "./backoff";

describe("calculateBackoffMs", () => {
  beforeEach(() => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should grow exponentially and cap at maxDelay", () => {
    const config = { initialDelayMs: 1000, maxDelayMs: 5000, multiplier: 2, jitterFactor: 0 };

    expect(calculateBackoffMs(0, config)).toBe(1000);
    expect(calculateBackoffMs(1, config)).toBe(2000);
    expect(calculateBackoffMs(2, config)).toBe(4000);
    expect(calculateBackoffMs(3, config)).toBe(5000);
    expect(calculateBackoffMs(10, config)).toBe(5000);
  });

  it("should add jitter to the default config", () => {
    // 1000 + 1000 * 0.1 * 0.5
    expect(calculateBackoffMs(0)).toBe(1050);
  });

  it("should keep conflict backoff in the millisecond range", () => {
    // 5 + 5 * 0.5 * 0.5 = 6.25
    expect(calculateBackoffMs(0, CONFLICT_BACKOFF_CONFIG)).toBe(6);
    // capped at 200 + 200 * 0.25
    expect(calculateBackoffMs(10, CONFLICT_BACKOFF_CONFIG)).toBe(250);
  });

  it("should back off harder after quota rejections", () => {
    const defaultDelay = calculateBackoffMs(0, { ...DEFAULT_BACKOFF_CONFIG, jitterFactor: 0 });
    const quotaDelay = calculateBackoffMs(0, { ...RATE_LIMIT_BACKOFF_CONFIG, jitterFactor: 0 });

    expect(quotaDelay).toBeGreaterThan(defaultDelay);
  });
});

describe("parseRetryAfterMs", () => {
  it("should parse integer seconds", () => {
    expect(parseRetryAfterMs("30")).toBe(30000);
    expect(parseRetryAfterMs("0")).toBe(0);
  });

  it("should return null for invalid input", () => {
    expect(parseRetryAfterMs(null)).toBeNull();
    expect(parseRetryAfterMs("")).toBeNull();
    expect(parseRetryAfterMs("soon")).toBeNull();
  });

  it("should return 0 for past HTTP dates", () => {
    const pastDate = new Date(Date.now() - 10000).toUTCString();
    expect(parseRetryAfterMs(pastDate)).toBe(0);
  });
});

describe("isRetryableStatusCode", () => {
  it("should classify status codes", () => {
    expect(isRetryableStatusCode(429)).toBe(true);
    expect(isRetryableStatusCode(503)).toBe(true);
    expect(isRetryableStatusCode(403)).toBe(false);
    expect(isRetryableStatusCode(200)).toBe(false);
  });
});

describe("getStatusCode", () => {
  it("should read the shapes googleapis errors come in", () => {
    expect(getStatusCode({ status: 429 })).toBe(429);
    expect(getStatusCode({ code: "403" })).toBe(403);
    expect(getStatusCode({ code: 404 })).toBe(404);
    expect(getStatusCode({ response: { status: 500 } })).toBe(500);
    expect(getStatusCode({ code: "ECONNRESET" })).toBeUndefined();
  });
});

describe("isRetryableError", () => {
  it("should retry quota and server errors", () => {
    expect(isRetryableError({ status: 429 })).toBe(true);
    expect(isRetryableError({ code: "503" })).toBe(true);
    expect(isRetryableError({ response: { status: 502 } })).toBe(true);
  });

  it("should not retry permission or range errors", () => {
    expect(isRetryableError({ status: 403 })).toBe(false);
    expect(isRetryableError({ code: "400" })).toBe(false);
    expect(isRetryableError(new Error("Unable to parse range: 'Missing'!A2:F"))).toBe(false);
    expect(isRetryableError(new Error("The caller does not have permission"))).toBe(false);
  });

  it("should retry network errors", () => {
    expect(isRetryableError({ code: "ECONNRESET" })).toBe(true);
    expect(isRetryableError({ code: "ETIMEDOUT" })).toBe(true);
  });

  it("should not retry domain errors by name", () => {
    const error = new Error("not found");
    error.name = "LedgerError";
    expect(isRetryableError(error)).toBe(false);
  });

  it("should retry unknown values", () => {
    expect(isRetryableError(null)).toBe(true);
    expect(isRetryableError("boom")).toBe(true);
    expect(isRetryableError(new Error("Something went wrong"))).toBe(true);
  });
});
