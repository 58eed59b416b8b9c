import { and, asc, desc, eq, gte, lte, sql } from "drizzle-orm";
import type { Database } from "../db/client";
import { schema } from "../db/client";
import type { PersonaAssignmentRow } from "../../drizzle/schema";
import { PersonaAssignmentSchema, type PersonaAssignment } from "../personas/schemas";
import type {
  AccountRecord,
  AccountType,
  LiabilityRecord,
  PaymentChannel,
  TransactionRecord,
  UserRecord,
  WindowType,
} from "../types";
import type {
  FinancialDataStore,
  PersonaAssignmentStore,
  SignalCacheEntry,
  SignalCacheStore,
  TransactionDateRange,
  TransactionQuery,
} from "./ports";

const ACCOUNT_TYPES: readonly AccountType[] = ["depository", "credit", "loan", "investment", "other"];
const PAYMENT_CHANNELS: readonly PaymentChannel[] = ["ach", "online", "in store", "other"];

function toAccountType(value: string): AccountType {
  return ACCOUNT_TYPES.find((candidate) => candidate === value) ?? "other";
}

function toPaymentChannel(value: string | null): PaymentChannel | null {
  if (value === null) {
    return null;
  }
  return PAYMENT_CHANNELS.find((candidate) => candidate === value) ?? "other";
}

function toNumber(value: string | null): number | null {
  return value === null ? null : Number(value);
}

export class DrizzleFinancialStore implements FinancialDataStore {
  constructor(private readonly db: Database) {}

  async listTransactions(userId: string, query: TransactionQuery): Promise<TransactionRecord[]> {
    const conditions = [
      eq(schema.accounts.userId, userId),
      gte(schema.transactions.date, query.start),
      lte(schema.transactions.date, query.end),
    ];
    if (!query.includePending) {
      conditions.push(eq(schema.transactions.pending, false));
    }
    const rows = await this.db
      .select({ transaction: schema.transactions })
      .from(schema.transactions)
      .innerJoin(schema.accounts, eq(schema.transactions.accountId, schema.accounts.id))
      .where(and(...conditions))
      .orderBy(asc(schema.transactions.date), asc(schema.transactions.id));

    return rows.map(({ transaction }) => ({
      id: transaction.id,
      accountId: transaction.accountId,
      date: transaction.date,
      amount: Number(transaction.amount),
      merchantName: transaction.merchantName,
      categories: transaction.categories,
      paymentChannel: toPaymentChannel(transaction.paymentChannel),
      pending: transaction.pending,
    }));
  }

  async getTransactionDateRange(userId: string): Promise<TransactionDateRange | null> {
    const [row] = await this.db
      .select({
        earliest: sql<string | null>`min(${schema.transactions.date})`,
        latest: sql<string | null>`max(${schema.transactions.date})`,
      })
      .from(schema.transactions)
      .innerJoin(schema.accounts, eq(schema.transactions.accountId, schema.accounts.id))
      .where(and(eq(schema.accounts.userId, userId), eq(schema.transactions.pending, false)));

    if (!row?.earliest || !row.latest) {
      return null;
    }
    return { earliest: row.earliest, latest: row.latest };
  }

  async listAccounts(userId: string): Promise<AccountRecord[]> {
    const rows = await this.db
      .select()
      .from(schema.accounts)
      .where(eq(schema.accounts.userId, userId))
      .orderBy(asc(schema.accounts.id));

    return rows.map((row) => ({
      id: row.id,
      userId: row.userId,
      type: toAccountType(row.type),
      subtype: row.subtype,
      balanceCurrent: Number(row.balanceCurrent),
      balanceAvailable: toNumber(row.balanceAvailable),
      creditLimit: toNumber(row.creditLimit),
    }));
  }

  async listLiabilities(userId: string): Promise<LiabilityRecord[]> {
    const rows = await this.db
      .select({ liability: schema.liabilities })
      .from(schema.liabilities)
      .innerJoin(schema.accounts, eq(schema.liabilities.accountId, schema.accounts.id))
      .where(eq(schema.accounts.userId, userId));

    return rows.map(({ liability }) => ({
      accountId: liability.accountId,
      apr: toNumber(liability.apr),
      minimumPayment: toNumber(liability.minimumPayment),
      isOverdue: liability.isOverdue,
    }));
  }

  async getUser(userId: string): Promise<UserRecord | null> {
    const [row] = await this.db.select().from(schema.users).where(eq(schema.users.id, userId)).limit(1);
    if (!row) {
      return null;
    }
    return {
      id: row.id,
      createdAt: row.createdAt.toISOString(),
      consent: {
        granted: row.consentGranted,
        updatedAt: row.consentUpdatedAt ? row.consentUpdatedAt.toISOString() : null,
      },
    };
  }

  async setConsent(userId: string, granted: boolean, at: Date): Promise<boolean> {
    const updated = await this.db
      .update(schema.users)
      .set({ consentGranted: granted, consentUpdatedAt: at, updatedAt: at })
      .where(eq(schema.users.id, userId))
      .returning({ id: schema.users.id });
    return updated.length > 0;
  }
}

export class DrizzleSignalCache implements SignalCacheStore {
  constructor(private readonly db: Database) {}

  async read(userId: string, windowType: WindowType): Promise<SignalCacheEntry | null> {
    const [row] = await this.db
      .select()
      .from(schema.signalCache)
      .where(and(eq(schema.signalCache.userId, userId), eq(schema.signalCache.windowType, windowType)))
      .limit(1);
    if (!row) {
      return null;
    }
    return {
      userId: row.userId,
      windowType,
      computedAt: row.computedAt.toISOString(),
      bundle: row.bundle,
    };
  }

  async write(entry: SignalCacheEntry): Promise<void> {
    const computedAt = new Date(entry.computedAt);
    await this.db
      .insert(schema.signalCache)
      .values({
        userId: entry.userId,
        windowType: entry.windowType,
        computedAt,
        bundle: entry.bundle,
      })
      .onConflictDoUpdate({
        target: [schema.signalCache.userId, schema.signalCache.windowType],
        set: { computedAt, bundle: entry.bundle },
      });
  }
}

function toAssignment(row: PersonaAssignmentRow): PersonaAssignment {
  return PersonaAssignmentSchema.parse({
    userId: row.userId,
    persona: row.persona,
    displayName: row.displayName,
    priority: row.priority,
    signalStrength: row.signalStrength,
    dataAvailability: row.dataAvailability,
    windowType: row.windowType,
    disclaimer: row.disclaimer,
    trace: row.trace,
    assignedAt: row.assignedAt.toISOString(),
  });
}

export class DrizzleAssignmentStore implements PersonaAssignmentStore {
  constructor(private readonly db: Database) {}

  async record(assignment: PersonaAssignment): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx
        .update(schema.personaAssignments)
        .set({ isCurrent: false })
        .where(
          and(eq(schema.personaAssignments.userId, assignment.userId), eq(schema.personaAssignments.isCurrent, true)),
        );
      await tx.insert(schema.personaAssignments).values({
        userId: assignment.userId,
        persona: assignment.persona,
        displayName: assignment.displayName,
        priority: assignment.priority,
        signalStrength: assignment.signalStrength,
        dataAvailability: assignment.dataAvailability,
        windowType: assignment.windowType,
        disclaimer: assignment.disclaimer,
        trace: assignment.trace,
        isCurrent: true,
        assignedAt: new Date(assignment.assignedAt),
      });
    });
  }

  async current(userId: string): Promise<PersonaAssignment | null> {
    const [row] = await this.db
      .select()
      .from(schema.personaAssignments)
      .where(and(eq(schema.personaAssignments.userId, userId), eq(schema.personaAssignments.isCurrent, true)))
      .limit(1);
    return row ? toAssignment(row) : null;
  }

  async history(userId: string, limit: number): Promise<PersonaAssignment[]> {
    const rows = await this.db
      .select()
      .from(schema.personaAssignments)
      .where(eq(schema.personaAssignments.userId, userId))
      .orderBy(desc(schema.personaAssignments.assignedAt), desc(schema.personaAssignments.id))
      .limit(Math.max(0, limit));
    return rows.map(toAssignment);
  }
}
