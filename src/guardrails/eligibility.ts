import type { AccountRecord, CandidateContentItem, SignalBundle } from "../types";

export const HARMFUL_PRODUCTS = [
  "payday loan",
  "payday lending",
  "title loan",
  "pawn shop",
  "predatory lending",
  "high-cost loan",
] as const;

export const MIN_CREDIT_SCORE_PROXY = 650;

export interface EligibilityResult {
  eligible: boolean;
  reasons: string[];
}

export function isHarmfulProduct(title: string): boolean {
  const normalized = title.toLowerCase();
  return HARMFUL_PRODUCTS.some((product) => normalized.includes(product));
}

/** Rough score estimate; only used to gate balance transfer offers. */
export function creditScoreProxy(utilization: number): number {
  return 750 - utilization * 2;
}

export function holdsProduct(item: CandidateContentItem, accounts: AccountRecord[]): boolean {
  const title = item.title.toLowerCase();
  switch (item.offerType) {
    case "savings_account":
      return (
        title.includes("high-yield") &&
        accounts.some((account) => account.subtype === "money_market" || account.subtype === "hsa")
      );
    case "credit_card":
      return title.includes("secured") && accounts.some((account) => account.type === "credit");
    default:
      return false;
  }
}

export function checkMinimumRequirements(item: CandidateContentItem, signals: SignalBundle): EligibilityResult {
  if (item.offerType === "credit_card" && item.title.toLowerCase().includes("balance transfer")) {
    const proxy = creditScoreProxy(signals.credit.creditUtilization);
    if (proxy < MIN_CREDIT_SCORE_PROXY) {
      return {
        eligible: false,
        reasons: [`Credit score proxy ${proxy.toFixed(0)} below minimum ${MIN_CREDIT_SCORE_PROXY}`],
      };
    }
  }
  return { eligible: true, reasons: [] };
}

export function checkOfferEligibility(
  item: CandidateContentItem,
  accounts: AccountRecord[],
  signals: SignalBundle,
): EligibilityResult {
  if (isHarmfulProduct(item.title)) {
    return { eligible: false, reasons: ["Product filtered: harmful financial product"] };
  }
  if (holdsProduct(item, accounts)) {
    return { eligible: false, reasons: [`User already has ${item.offerType ?? "this product"}`] };
  }
  return checkMinimumRequirements(item, signals);
}
