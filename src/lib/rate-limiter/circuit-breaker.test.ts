import { CircuitOpenError, type CircuitBreakerState, createCircuitBreaker } from "./circuit-breaker";

const failing = async (): Promise<string> => {
  throw new Error("backend error");
};

describe("createCircuitBreaker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should start CLOSED and pass results through", async () => {
    const breaker = createCircuitBreaker();

    expect(breaker.getState()).toBe("CLOSED");
    await expect(breaker.execute(async () => "ok")).resolves.toBe("ok");
  });

  it("should open after consecutive failures and fail fast", async () => {
    const breaker = createCircuitBreaker({ failureThreshold: 3, resetTimeoutMs: 30_000 });
    const fn = vi.fn(failing);

    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fn)).rejects.toThrow("backend error");
    }

    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(breaker.getState()).toBe("OPEN");
  });

  it("should not open before the threshold", async () => {
    const breaker = createCircuitBreaker({ failureThreshold: 5, resetTimeoutMs: 30_000 });

    for (let i = 0; i < 4; i++) {
      await expect(breaker.execute(failing)).rejects.toThrow("backend error");
    }

    expect(breaker.getState()).toBe("CLOSED");
  });

  it("should report transitions and close after a successful trial call", async () => {
    const states: CircuitBreakerState[] = [];
    const breaker = createCircuitBreaker({
      failureThreshold: 2,
      resetTimeoutMs: 1000,
      onStateChange: (state) => states.push(state),
    });

    await expect(breaker.execute(failing)).rejects.toThrow("backend error");
    await expect(breaker.execute(failing)).rejects.toThrow("backend error");
    vi.advanceTimersByTime(1001);
    await expect(breaker.execute(async () => "recovered")).resolves.toBe("recovered");

    expect(breaker.getState()).toBe("CLOSED");
    expect(states).toEqual(["OPEN", "HALF_OPEN", "CLOSED"]);
  });
});
