import { randomUUID } from "node:crypto";
import { logger } from "../logger";
import {
  AcceptedBiddersChoices,
  CategoryChoices,
  ConditionChoices,
  CurrencyChoices,
  StatusChoices,
  TagChoices,
} from "./choices";
import { Category, NewAuction, Tag } from "./models";
import { AuctionStore } from "./store";

export const NumberOfAuctions = 201;
export const TagsPerAuction = 3;

const AcceptedLocations = ["GE", "AL", "HR"];
const AuctionLengthDays = 10;
const DayMs = 24 * 60 * 60 * 1000;

export type Random = () => number;

export interface SeedOptions {
  readonly count?: number;
  readonly random?: Random;
  readonly now?: Date;
  readonly uuid?: () => string;
}

export interface SeedResult {
  readonly auctions: number;
  readonly categories: number;
  readonly tags: number;
}

export function pick<T>(items: readonly T[], random: Random): T {
  return items[Math.floor(random() * items.length)];
}

/**
 * Picks `count` distinct items with a partial Fisher-Yates shuffle
 */
export function sample<T>(items: readonly T[], count: number, random: Random): T[] {
  if (count > items.length) {
    throw new RangeError(`Cannot sample ${count} of ${items.length} items`);
  }
  const pool = [...items];
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function buildAuction(
  category: Category,
  tags: Tag[],
  random: Random,
  now: Date,
  uuid: () => string,
): NewAuction {
  const condition = pick(ConditionChoices, random);
  return {
    id: uuid(),
    author: uuid(),
    auctionName: `${tags[0]?.name ?? "Listed"} ${category.name}`,
    description: `${condition} item from ${category.name}.`,
    categoryId: category.id,
    startDate: isoDate(now),
    endDate: isoDate(new Date(now.getTime() + AuctionLengthDays * DayMs)),
    maxPrice: (1 + random() * 999_998).toFixed(2),
    quantity: 1 + Math.floor(random() * 100),
    acceptedBidders: pick(AcceptedBiddersChoices, random),
    acceptedLocations: [pick(AcceptedLocations, random)],
    status: pick(StatusChoices, random),
    currency: pick(CurrencyChoices, random),
    condition,
  };
}

/**
 * Gets or creates every category and tag, then creates auctions with random
 * choices, each linked to a category and to three distinct tags.
 */
export async function createAuctions(
  store: AuctionStore,
  options: SeedOptions = {},
): Promise<SeedResult> {
  const count = options.count ?? NumberOfAuctions;
  const random = options.random ?? Math.random;
  const now = options.now ?? new Date();
  const uuid = options.uuid ?? randomUUID;

  logger.info("Creating or getting categories and tags");
  const categories: Category[] = [];
  for (const name of CategoryChoices) {
    categories.push(await store.getOrCreateCategory(name));
  }
  const tags: Tag[] = [];
  for (const name of TagChoices) {
    tags.push(await store.getOrCreateTag(name));
  }

  logger.info({ count }, "Creating auctions");
  for (let i = 0; i < count; i++) {
    const auctionTags = sample(tags, TagsPerAuction, random);
    const auction = buildAuction(
      pick(categories, random),
      auctionTags,
      random,
      now,
      uuid,
    );
    await store.createAuction(
      auction,
      auctionTags.map((tag) => tag.id),
    );
  }

  logger.info({ count }, "Created auctions");
  return { auctions: count, categories: categories.length, tags: tags.length };
}
