import choices from "./data/choices.json";

export const CategoryChoices: readonly string[] = choices.categories;
export const TagChoices: readonly string[] = choices.tags;

export const ConditionChoices = [
  "New",
  "Open box",
  "Excellent",
  "Very Good",
  "Good",
  "Used",
  "For parts or not working",
] as const;
export type Condition = (typeof ConditionChoices)[number];

export const StatusChoices = [
  "active",
  "draft",
  "completed",
  "canceled",
] as const;
export type AuctionStatus = (typeof StatusChoices)[number];

export const AcceptedBiddersChoices = [
  "Company",
  "Individual",
  "Both",
] as const;
export type AcceptedBidders = (typeof AcceptedBiddersChoices)[number];

export const CurrencyChoices = ["GEL", "USD", "EUR"] as const;
export type Currency = (typeof CurrencyChoices)[number];

export function isAuctionStatus(value: string): value is AuctionStatus {
  return StatusChoices.some((status) => status === value);
}
