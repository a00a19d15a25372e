import postgres, { PendingQuery, Row, Sql } from "postgres";
import { DatabaseConfig } from "../config";
import {
  Auction,
  AuctionFilter,
  AuctionOrderField,
  AuctionOrdering,
  Category,
  NewAuction,
  NewUser,
  Tag,
  User,
} from "./models";

export interface AuctionStore {
  getOrCreateCategory(name: string): Promise<Category>;
  getOrCreateTag(name: string): Promise<Tag>;
  // Inserts the auction and its tag links as one statement
  createAuction(auction: NewAuction, tagIds: number[]): Promise<void>;
  countAuctions(filter: AuctionFilter): Promise<number>;
  listAuctions(
    filter: AuctionFilter,
    limit: number,
    offset: number,
  ): Promise<Auction[]>;
  getAuction(id: string): Promise<Auction | undefined>;
  listCategories(): Promise<Category[]>;
  listTags(): Promise<Tag[]>;
}

export interface UserStore {
  findUser(username: string): Promise<User | undefined>;
  createUser(user: NewUser): Promise<User>;
}

export interface MigrationStore {
  ensureMigrationsTable(): Promise<void>;
  appliedMigrations(): Promise<Set<string>>;
  // Runs the migration and records it in one transaction
  applyMigration(filename: string, sql: string): Promise<void>;
}

export interface DatabaseHealth {
  ping(): Promise<void>;
}

interface AuctionRow {
  id: string;
  author: string;
  auction_name: string;
  description: string;
  category: string;
  start_date: string;
  end_date: string;
  max_price: string;
  quantity: number;
  accepted_bidders: string;
  accepted_locations: string[];
  status: string;
  currency: string;
  condition: string;
  top_bid: string | null;
  tags: string[];
}

interface UserRow {
  id: number;
  username: string;
  email: string;
  is_superuser: boolean;
}

export function createSql(config: DatabaseConfig): Sql {
  return postgres({
    host: config.host,
    port: config.port,
    database: config.database,
    username: config.user,
    password: config.password,
    max: 10,
    onnotice: () => undefined,
  });
}

type Fragment = PendingQuery<Row[]>;

const OrderColumns: Record<AuctionOrderField, string> = {
  start_date: "a.start_date",
  end_date: "a.end_date",
  max_price: "a.max_price",
  quantity: "a.quantity",
  category: "c.name",
  status: "a.status",
};

// Matches `term` anywhere, with LIKE wildcards in it taken literally
function containing(term: string): string {
  return `%${term.replace(/[\\%_]/g, "\\$&")}%`;
}

function toAuction(row: AuctionRow): Auction {
  return {
    id: row.id,
    author: row.author,
    auctionName: row.auction_name,
    description: row.description,
    category: row.category,
    startDate: row.start_date,
    endDate: row.end_date,
    maxPrice: row.max_price,
    quantity: row.quantity,
    acceptedBidders: row.accepted_bidders,
    acceptedLocations: row.accepted_locations,
    status: row.status,
    currency: row.currency,
    condition: row.condition,
    topBid: row.top_bid,
    tags: row.tags,
  };
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    isSuperuser: row.is_superuser,
  };
}

/**
 * postgres.js backed storage for the auctions service
 */
export class PostgresStore
  implements AuctionStore, UserStore, MigrationStore, DatabaseHealth
{
  constructor(private readonly sql: Sql) {}

  async ping(): Promise<void> {
    await this.sql`select 1`;
  }

  async ensureMigrationsTable(): Promise<void> {
    await this.sql`
      create table if not exists schema_migrations (
        filename text primary key,
        applied_at timestamptz not null default now()
      )
    `;
  }

  async appliedMigrations(): Promise<Set<string>> {
    const rows = await this.sql<{ filename: string }[]>`
      select filename from schema_migrations order by filename
    `;
    return new Set(rows.map((row) => row.filename));
  }

  async applyMigration(filename: string, text: string): Promise<void> {
    await this.sql.begin(async (tx) => {
      await tx.unsafe(text);
      await tx.unsafe(
        "insert into schema_migrations (filename) values ($1)",
        [filename],
      );
    });
  }

  async getOrCreateCategory(name: string): Promise<Category> {
    const [row] = await this.sql<Category[]>`
      insert into category (name) values (${name})
      on conflict (name) do update set name = excluded.name
      returning id, name
    `;
    return row;
  }

  async getOrCreateTag(name: string): Promise<Tag> {
    const [row] = await this.sql<Tag[]>`
      insert into tag (name) values (${name})
      on conflict (name) do update set name = excluded.name
      returning id, name
    `;
    return row;
  }

  async createAuction(auction: NewAuction, tagIds: number[]): Promise<void> {
    await this.sql`
      with new_auction as (
        insert into auction (
          id, author, auction_name, description, category_id, start_date,
          end_date, max_price, quantity, accepted_bidders, accepted_locations,
          status, currency, condition
        ) values (
          ${auction.id}::uuid, ${auction.author}::uuid, ${auction.auctionName},
          ${auction.description}, ${auction.categoryId},
          ${auction.startDate}::date, ${auction.endDate}::date,
          ${auction.maxPrice}::numeric, ${auction.quantity},
          ${auction.acceptedBidders}, ${this.sql.array(auction.acceptedLocations)},
          ${auction.status}, ${auction.currency}, ${auction.condition}
        )
        returning id
      )
      insert into auction_tags (auction_id, tag_id)
      select new_auction.id, tag_id
      from new_auction, unnest(${this.sql.array(tagIds)}::int[]) as tag_id
    `;
  }

  private where(filter: AuctionFilter): Fragment {
    const sql = this.sql;
    const conditions: Fragment[] = [];
    if (filter.status !== undefined) {
      conditions.push(sql`a.status = ${filter.status}`);
    }
    if (filter.startsAfter !== undefined) {
      conditions.push(sql`a.start_date > ${filter.startsAfter}::date`);
    }
    if (filter.category !== undefined) {
      conditions.push(sql`c.name = ${filter.category}`);
    }
    if (filter.startDate !== undefined) {
      conditions.push(sql`a.start_date >= ${filter.startDate}::date`);
    }
    if (filter.endDate !== undefined) {
      conditions.push(sql`a.end_date <= ${filter.endDate}::date`);
    }
    if (filter.minPrice !== undefined) {
      conditions.push(sql`a.max_price >= ${filter.minPrice}::numeric`);
    }
    if (filter.maxPrice !== undefined) {
      conditions.push(sql`a.max_price <= ${filter.maxPrice}::numeric`);
    }
    for (const term of filter.search ?? []) {
      const pattern = containing(term);
      conditions.push(sql`(
        a.auction_name ilike ${pattern}
        or a.description ilike ${pattern}
        or exists (
          select 1 from auction_tags st join tag s on s.id = st.tag_id
          where st.auction_id = a.id and s.name ilike ${pattern}
        )
      )`);
    }
    return conditions.reduce(
      (clause, condition) => sql`${clause} and ${condition}`,
      sql`where true`,
    );
  }

  private orderBy(ordering: readonly AuctionOrdering[] = []): Fragment {
    const sql = this.sql;
    const keys: Fragment[] = [
      ...ordering.map(
        ({ field, descending }) =>
          sql`${sql(OrderColumns[field])} ${descending ? sql`desc` : sql`asc`}`,
      ),
      sql`a.created_at desc`,
      sql`a.id`,
    ];
    return keys.reduce((clause, key) => sql`${clause}, ${key}`);
  }

  async countAuctions(filter: AuctionFilter): Promise<number> {
    const [{ count }] = await this.sql<{ count: number }[]>`
      select count(*)::int as count
      from auction a join category c on c.id = a.category_id
      ${this.where(filter)}
    `;
    return count;
  }

  private selectAuctions() {
    return this.sql`
      select a.id::text, a.author::text, a.auction_name, a.description,
        c.name as category, a.start_date::text, a.end_date::text,
        a.max_price::text,
        a.quantity, a.accepted_bidders, a.accepted_locations, a.status,
        a.currency, a.condition, a.top_bid::text,
        coalesce(
          array_agg(t.name order by t.name) filter (where t.name is not null),
          '{}'
        ) as tags
      from auction a
        join category c on c.id = a.category_id
        left join auction_tags atg on atg.auction_id = a.id
        left join tag t on t.id = atg.tag_id
    `;
  }

  async listAuctions(
    filter: AuctionFilter,
    limit: number,
    offset: number,
  ): Promise<Auction[]> {
    const rows = await this.sql<AuctionRow[]>`
      ${this.selectAuctions()}
      ${this.where(filter)}
      group by a.id, c.name
      order by ${this.orderBy(filter.ordering)}
      limit ${limit} offset ${offset}
    `;
    return rows.map(toAuction);
  }

  async getAuction(id: string): Promise<Auction | undefined> {
    const rows = await this.sql<AuctionRow[]>`
      ${this.selectAuctions()}
      where a.id = ${id}::uuid
      group by a.id, c.name
    `;
    return rows.length > 0 ? toAuction(rows[0]) : undefined;
  }

  async listCategories(): Promise<Category[]> {
    return await this.sql<Category[]>`select id, name from category order by name`;
  }

  async listTags(): Promise<Tag[]> {
    return await this.sql<Tag[]>`select id, name from tag order by name`;
  }

  async findUser(username: string): Promise<User | undefined> {
    const rows = await this.sql<UserRow[]>`
      select id, username, email, is_superuser from users
      where username = ${username}
    `;
    return rows.length > 0 ? toUser(rows[0]) : undefined;
  }

  async createUser(user: NewUser): Promise<User> {
    const [row] = await this.sql<UserRow[]>`
      insert into users (username, email, password_hash, is_superuser, is_staff)
      values (
        ${user.username}, ${user.email}, ${user.passwordHash},
        ${user.isSuperuser}, ${user.isSuperuser}
      )
      returning id, username, email, is_superuser
    `;
    return toUser(row);
  }
}
