import { relations, sql } from "drizzle-orm";
import {
  bigserial,
  boolean,
  date,
  doublePrecision,
  index,
  integer,
  jsonb,
  numeric,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import type { DecisionTrace } from "../src/personas/schemas";
import type { SignalBundle } from "../src/types";

export const users = pgTable("users", {
  id: text("id").primaryKey(),
  consentGranted: boolean("consent_granted").notNull().default(false),
  consentUpdatedAt: timestamp("consent_updated_at", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true })
    .defaultNow()
    .notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .defaultNow()
    .notNull(),
});

export const accounts = pgTable(
  "accounts",
  {
    id: text("id").primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    type: text("type").notNull(),
    subtype: text("subtype"),
    balanceCurrent: numeric("balance_current", { precision: 14, scale: 2 })
      .notNull()
      .default(sql`0`),
    balanceAvailable: numeric("balance_available", { precision: 14, scale: 2 }),
    creditLimit: numeric("credit_limit", { precision: 14, scale: 2 }),
  },
  (table) => ({
    userIdx: index("accounts_user_idx").on(table.userId),
  })
);

export const liabilities = pgTable(
  "liabilities",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    accountId: text("account_id")
      .notNull()
      .references(() => accounts.id, { onDelete: "cascade" }),
    apr: numeric("apr", { precision: 6, scale: 3 }),
    minimumPayment: numeric("minimum_payment", { precision: 14, scale: 2 }),
    isOverdue: boolean("is_overdue").notNull().default(false),
  },
  (table) => ({
    accountUnique: uniqueIndex("liabilities_account_unique").on(table.accountId),
  })
);

export const transactions = pgTable(
  "transactions",
  {
    id: text("id").primaryKey(),
    accountId: text("account_id")
      .notNull()
      .references(() => accounts.id, { onDelete: "cascade" }),
    date: date("date", { mode: "string" }).notNull(),
    amount: numeric("amount", { precision: 14, scale: 2 }).notNull(),
    merchantName: text("merchant_name"),
    paymentChannel: text("payment_channel"),
    categories: jsonb("categories")
      .$type<string[]>()
      .notNull()
      .default(sql`'[]'::jsonb`),
    pending: boolean("pending").notNull().default(false),
  },
  (table) => ({
    accountDateIdx: index("transactions_account_date_idx").on(table.accountId, table.date),
  })
);

export const signalCache = pgTable(
  "signal_cache",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    windowType: text("window_type").notNull(),
    computedAt: timestamp("computed_at", { withTimezone: true }).notNull(),
    bundle: jsonb("bundle").$type<SignalBundle>().notNull(),
  },
  (table) => ({
    userWindowUnique: uniqueIndex("signal_cache_user_window_unique").on(table.userId, table.windowType),
  })
);

export const personaAssignments = pgTable(
  "persona_assignments",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    persona: text("persona").notNull(),
    displayName: text("display_name").notNull(),
    priority: integer("priority").notNull(),
    signalStrength: doublePrecision("signal_strength").notNull().default(0),
    dataAvailability: text("data_availability").notNull(),
    windowType: text("window_type").notNull(),
    disclaimer: text("disclaimer"),
    trace: jsonb("trace").$type<DecisionTrace>().notNull(),
    isCurrent: boolean("is_current").notNull().default(true),
    assignedAt: timestamp("assigned_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    userAssignedUnique: uniqueIndex("persona_assignments_user_assigned_unique").on(
      table.userId,
      table.assignedAt
    ),
    currentUnique: uniqueIndex("persona_assignments_current_unique")
      .on(table.userId)
      .where(sql`${table.isCurrent}`),
  })
);

export const usersRelations = relations(users, ({ many }) => ({
  accounts: many(accounts),
  signalCache: many(signalCache),
  personaAssignments: many(personaAssignments),
}));

export const accountsRelations = relations(accounts, ({ one, many }) => ({
  user: one(users, {
    fields: [accounts.userId],
    references: [users.id],
  }),
  liability: one(liabilities),
  transactions: many(transactions),
}));

export const liabilitiesRelations = relations(liabilities, ({ one }) => ({
  account: one(accounts, {
    fields: [liabilities.accountId],
    references: [accounts.id],
  }),
}));

export const transactionsRelations = relations(transactions, ({ one }) => ({
  account: one(accounts, {
    fields: [transactions.accountId],
    references: [accounts.id],
  }),
}));

export const signalCacheRelations = relations(signalCache, ({ one }) => ({
  user: one(users, {
    fields: [signalCache.userId],
    references: [users.id],
  }),
}));

export const personaAssignmentsRelations = relations(personaAssignments, ({ one }) => ({
  user: one(users, {
    fields: [personaAssignments.userId],
    references: [users.id],
  }),
}));

export type PersonaAssignmentRow = typeof personaAssignments.$inferSelect;
