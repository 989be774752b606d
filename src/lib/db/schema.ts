import {
  boolean,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

export const accounts = pgTable(
  "accounts",
  {
    id: text("id").primaryKey(),
    fullName: text("full_name").notNull().default(""),
    phone: text("phone").notNull().default(""),
    username: text("username").notNull().default(""),
    balance: integer("balance").notNull().default(0),
    role: text("role").notNull(), // 'teacher' | 'student'
    status: text("status").notNull(), // 'pending' | 'active' | 'pending_restore' | 'deleted' | 'banned'
    groupId: text("group_id"),
    version: integer("version").notNull().default(0),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }),
  },
  (table) => ({
    groupStatusIdx: index("idx_accounts_group_status").on(table.groupId, table.status),
  }),
);

export const groups = pgTable("groups", {
  id: text("id").primaryKey(),
  displayName: text("display_name").notNull(),
  hidden: boolean("hidden").notNull().default(false),
  status: text("status").notNull(), // 'active' | 'deleted'
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const transactionLogs = pgTable(
  "transaction_logs",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    type: text("type").notNull(), // 'transfer' | 'add' | 'subtract' | 'manual_edit'
    senderId: text("sender_id"),
    recipientId: text("recipient_id"),
    actorId: text("actor_id"),
    amount: integer("amount").notNull(),
    commission: integer("commission").notNull().default(0),
    oldBalance: integer("old_balance"),
    newBalance: integer("new_balance"),
    source: text("source").notNull(), // 'bot' | 'spreadsheet'
    reason: text("reason"),
    status: text("status").notNull().default("completed"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    senderIdx: index("idx_transaction_logs_sender").on(table.senderId),
    recipientIdx: index("idx_transaction_logs_recipient").on(table.recipientId),
    createdAtIdx: index("idx_transaction_logs_created_at").on(table.createdAt),
  }),
);

export const settings = pgTable("settings", {
  id: text("id").primaryKey(),
  document: jsonb("document").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});
