import type { PersonaAssignment } from "../personas/schemas";
import type { AccountRecord, LiabilityRecord, TransactionRecord, UserRecord, WindowType } from "../types";
import type {
  FinancialDataStore,
  PersonaAssignmentStore,
  SignalCacheEntry,
  SignalCacheStore,
  TransactionDateRange,
  TransactionQuery,
} from "./ports";

export interface FinancialSeed {
  users?: UserRecord[];
  accounts?: AccountRecord[];
  liabilities?: LiabilityRecord[];
  transactions?: TransactionRecord[];
}

function byDate(a: TransactionRecord, b: TransactionRecord): number {
  if (a.date === b.date) {
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  }
  return a.date < b.date ? -1 : 1;
}

/** Process-local store used when no database is configured, and by tests. */
export class InMemoryFinancialStore implements FinancialDataStore {
  private readonly users = new Map<string, UserRecord>();
  private readonly accounts: AccountRecord[] = [];
  private readonly liabilities: LiabilityRecord[] = [];
  private readonly transactions: TransactionRecord[] = [];

  constructor(seed: FinancialSeed = {}) {
    seed.users?.forEach((user) => this.upsertUser(user));
    this.accounts.push(...(seed.accounts ?? []));
    this.liabilities.push(...(seed.liabilities ?? []));
    this.transactions.push(...(seed.transactions ?? []));
  }

  upsertUser(user: UserRecord): void {
    this.users.set(user.id, { ...user, consent: { ...user.consent } });
  }

  addAccount(account: AccountRecord): void {
    this.accounts.push(account);
  }

  addLiability(liability: LiabilityRecord): void {
    this.liabilities.push(liability);
  }

  addTransactions(transactions: TransactionRecord[]): void {
    this.transactions.push(...transactions);
  }

  private accountIds(userId: string): Set<string> {
    return new Set(this.accounts.filter((account) => account.userId === userId).map((account) => account.id));
  }

  async listTransactions(userId: string, query: TransactionQuery): Promise<TransactionRecord[]> {
    const ids = this.accountIds(userId);
    return this.transactions
      .filter(
        (transaction) =>
          ids.has(transaction.accountId) &&
          transaction.date >= query.start &&
          transaction.date <= query.end &&
          (query.includePending || !transaction.pending),
      )
      .sort(byDate)
      .map((transaction) => ({ ...transaction, categories: [...transaction.categories] }));
  }

  async getTransactionDateRange(userId: string): Promise<TransactionDateRange | null> {
    const ids = this.accountIds(userId);
    const dates = this.transactions
      .filter((transaction) => ids.has(transaction.accountId) && !transaction.pending)
      .map((transaction) => transaction.date)
      .sort();
    if (!dates.length) {
      return null;
    }
    return { earliest: dates[0], latest: dates[dates.length - 1] };
  }

  async listAccounts(userId: string): Promise<AccountRecord[]> {
    return this.accounts.filter((account) => account.userId === userId).map((account) => ({ ...account }));
  }

  async listLiabilities(userId: string): Promise<LiabilityRecord[]> {
    const ids = this.accountIds(userId);
    return this.liabilities.filter((liability) => ids.has(liability.accountId)).map((liability) => ({ ...liability }));
  }

  async getUser(userId: string): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    return user ? { ...user, consent: { ...user.consent } } : null;
  }

  async setConsent(userId: string, granted: boolean, at: Date): Promise<boolean> {
    const user = this.users.get(userId);
    if (!user) {
      return false;
    }
    user.consent = { granted, updatedAt: at.toISOString() };
    return true;
  }
}

export class InMemorySignalCache implements SignalCacheStore {
  private readonly entries = new Map<string, SignalCacheEntry>();

  private key(userId: string, windowType: WindowType): string {
    return `${userId}:${windowType}`;
  }

  async read(userId: string, windowType: WindowType): Promise<SignalCacheEntry | null> {
    const entry = this.entries.get(this.key(userId, windowType));
    return entry ? structuredClone(entry) : null;
  }

  async write(entry: SignalCacheEntry): Promise<void> {
    this.entries.set(this.key(entry.userId, entry.windowType), structuredClone(entry));
  }

  clear(): void {
    this.entries.clear();
  }
}

export class InMemoryAssignmentStore implements PersonaAssignmentStore {
  private readonly assignments: PersonaAssignment[] = [];

  async record(assignment: PersonaAssignment): Promise<void> {
    this.assignments.push(assignment);
  }

  async current(userId: string): Promise<PersonaAssignment | null> {
    const [latest] = await this.history(userId, 1);
    return latest ?? null;
  }

  /** Newest first; later writes win ties on assignedAt. */
  async history(userId: string, limit: number): Promise<PersonaAssignment[]> {
    return this.assignments
      .map((assignment, index) => ({ assignment, index }))
      .filter(({ assignment }) => assignment.userId === userId)
      .sort((a, b) =>
        a.assignment.assignedAt === b.assignment.assignedAt
          ? b.index - a.index
          : a.assignment.assignedAt < b.assignment.assignedAt
            ? 1
            : -1,
      )
      .slice(0, Math.max(0, limit))
      .map(({ assignment }) => assignment);
  }
}
