import type { PersonaAssignment } from "../personas/schemas";
import type {
  AccountRecord,
  LiabilityRecord,
  SignalBundle,
  TransactionRecord,
  UserRecord,
  WindowType,
} from "../types";

export interface TransactionQuery {
  start: string;
  end: string;
  includePending: boolean;
}

export interface TransactionDateRange {
  earliest: string;
  latest: string;
}

/** Read side of the transaction store, plus the single consent write. */
export interface FinancialDataStore {
  listTransactions(userId: string, query: TransactionQuery): Promise<TransactionRecord[]>;
  /** Non-pending transactions only; null when the user has none. */
  getTransactionDateRange(userId: string): Promise<TransactionDateRange | null>;
  listAccounts(userId: string): Promise<AccountRecord[]>;
  listLiabilities(userId: string): Promise<LiabilityRecord[]>;
  getUser(userId: string): Promise<UserRecord | null>;
  /** Returns false when the user does not exist. */
  setConsent(userId: string, granted: boolean, at: Date): Promise<boolean>;
}

export interface SignalCacheEntry {
  userId: string;
  windowType: WindowType;
  computedAt: string;
  bundle: SignalBundle;
}

export interface SignalCacheStore {
  read(userId: string, windowType: WindowType): Promise<SignalCacheEntry | null>;
  write(entry: SignalCacheEntry): Promise<void>;
}

export interface PersonaAssignmentStore {
  /** Appends the assignment and makes it the user's current one. */
  record(assignment: PersonaAssignment): Promise<void>;
  current(userId: string): Promise<PersonaAssignment | null>;
  history(userId: string, limit: number): Promise<PersonaAssignment[]>;
}
