import { Hono } from "hono";

export interface HealthDeps {
  /** Rejects when the database is unreachable */
  ping: () => Promise<void>;
}

const checkDatabase = async (
  ping: HealthDeps["ping"],
): Promise<{ status: "healthy" | "unhealthy"; error?: string }> => {
  try {
    await ping();
    return { status: "healthy" };
  } catch (error) {
    return {
      status: "unhealthy",
      error: error instanceof Error ? error.message : String(error),
    };
  }
};

export const createHealthRoute = ({ ping }: HealthDeps): Hono => {
  const health = new Hono();

  health.get("/", async (c) => {
    const databaseCheck = await checkDatabase(ping);
    const healthy = databaseCheck.status === "healthy";

    return c.json(
      {
        status: healthy ? "healthy" : "unhealthy",
        timestamp: new Date().toISOString(),
        checks: {
          database: databaseCheck,
        },
      },
      healthy ? 200 : 503,
    );
  });

  return health;
};
