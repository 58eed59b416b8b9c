export type WindowType = '30d' | '180d';

export type PaymentChannel = 'ach' | 'online' | 'in store' | 'other';

export interface TransactionRecord {
  id: string;
  accountId: string;
  date: string; // YYYY-MM-DD
  amount: number; // positive = inflow
  merchantName: string | null;
  categories: string[];
  paymentChannel: PaymentChannel | null;
  pending: boolean;
}

export type AccountType = 'depository' | 'credit' | 'loan' | 'investment' | 'other';

export interface AccountRecord {
  id: string;
  userId: string;
  type: AccountType;
  subtype: string | null;
  balanceCurrent: number;
  balanceAvailable: number | null;
  creditLimit: number | null;
}

export interface LiabilityRecord {
  accountId: string;
  apr: number | null;
  minimumPayment: number | null;
  isOverdue: boolean;
}

export interface UserRecord {
  id: string;
  createdAt: string;
  consent: ConsentState;
}

export interface ConsentState {
  granted: boolean;
  updatedAt: string | null;
}

export interface DateWindow {
  type: WindowType;
  start: string;
  end: string;
  days: number;
}

export interface DetectorInput {
  transactions: TransactionRecord[];
  accounts: AccountRecord[];
  liabilities: LiabilityRecord[];
  windowDays: number;
}

export interface SubscriptionSignals {
  subscriptionsCount: number;
  recurringMerchants: string[];
  monthlyRecurringSpend: number;
  recurringSpendShare: number;
}

export interface SavingsSignals {
  netSavingsInflow: number;
  savingsGrowthRate: number;
  emergencyFundMonths: number;
}

export interface CreditSignals {
  creditUtilization: number;
  utilization30Flag: boolean;
  utilization50Flag: boolean;
  utilization80Flag: boolean;
  minPaymentOnly: boolean;
  interestCharges: number;
  isOverdue: boolean;
}

export type PayrollFrequency = 'monthly' | 'semi_monthly' | 'biweekly' | 'unknown';

export interface IncomeSignals {
  payrollFrequency: PayrollFrequency;
  medianPayGapDays: number;
  incomeVariability: number;
  monthlyIncome: number;
  cashFlowBufferMonths: number;
}

export interface SignalBundle {
  userId: string;
  windowType: WindowType | 'none';
  window: DateWindow | null;
  computedAt: string | null;
  subscriptions: SubscriptionSignals;
  savings: SavingsSignals;
  credit: CreditSignals;
  income: IncomeSignals;
}

export type DataAvailabilityTier = 'new' | 'limited' | 'full_30' | 'full_180';

export interface DataSpan {
  earliest: string | null;
  latest: string | null;
  totalDays: number;
}

export interface DegradedSignals {
  userId: string;
  tier: DataAvailabilityTier;
  dataAgeDays: number;
  canCompute30d: boolean;
  canCompute180d: boolean;
  signals30d: SignalBundle | null;
  signals180d: SignalBundle | null;
  disclaimer: string | null;
}

export type ContentType = 'education' | 'offer';

export type OfferType = 'savings_account' | 'credit_card' | 'app' | 'service';

export interface CandidateContentItem {
  type: ContentType;
  title: string;
  rationale: string;
  offerType?: OfferType;
}

export interface GuardedContentItem extends CandidateContentItem {
  disclosure: string;
}
