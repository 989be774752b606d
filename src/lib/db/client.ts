import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "./schema";

const createDrizzle = (client: postgres.Sql) => drizzle(client, { schema });

export type Database = ReturnType<typeof createDrizzle>;

export interface DatabaseInstance {
  db: Database;
  /** Runs `SELECT 1`; rejects when the database is unreachable */
  ping: () => Promise<void>;
  close: () => Promise<void>;
}

export const createDatabase = (connectionUrl: string): DatabaseInstance => {
  const postgresClient = postgres(connectionUrl, {
    max: 10,
  });

  const database = createDrizzle(postgresClient);

  return {
    db: database,
    ping: async (): Promise<void> => {
      await database.execute(sql`SELECT 1`);
    },
    close: async (): Promise<void> => {
      await postgresClient.end();
    },
  };
};
