import type { Document } from "mongodb";
import type { GenerateIdOptions, IdGeneratorContract } from "../../contracts";
import type { MongoDbDriver } from "./mongodb-driver";

interface CounterDocument extends Document {
  collection: string;
  id: number;
}

/**
 * MongoDB-specific id generator for auto-incrementing integer ids.
 *
 * Maintains a separate collection that tracks the last generated id for each table.
 *
 * **Collection Structure:**
 * ```json
 * {
 *   "collection": "people",
 *   "id": 12345
 * }
 * ```
 *
 * @example
 * ```typescript
 * const idGenerator = new MongoIdGenerator(mongoDriver);
 *
 * const id = await idGenerator.generateNextId({
 *   table: "people",
 *   initialId: 1000,
 *   incrementIdBy: 1,
 * });
 * ```
 */
export class MongoIdGenerator implements IdGeneratorContract {
  /**
   * The collection name that stores id counters.
   */
  public readonly counterCollection: string = "id_counters";

  public constructor(
    private readonly driver: MongoDbDriver,
    counterCollection?: string,
  ) {
    if (counterCollection) {
      this.counterCollection = counterCollection;
    }
  }

  /**
   * Generate the next id for a table.
   *
   * Uses an atomic findOneAndUpdate with an aggregation pipeline so concurrent
   * writers never receive the same id.
   */
  public async generateNextId(options: GenerateIdOptions): Promise<number> {
    const { table, initialId = 1, incrementIdBy = 1 } = options;

    const result = await this.counters().findOneAndUpdate(
      { collection: table },
      [
        {
          $set: {
            id: {
              $cond: {
                if: { $or: [{ $eq: ["$id", null] }, { $not: "$id" }] },
                then: initialId,
                else: { $add: ["$id", incrementIdBy] },
              },
            },
            collection: table,
          },
        },
      ],
      {
        upsert: true,
        returnDocument: "after",
      },
    );

    return result?.id ?? initialId;
  }

  /**
   * Get the last generated id for a table, 0 if none exists.
   */
  public async getLastId(table: string): Promise<number> {
    const counter = await this.counters().findOne({ collection: table });

    return counter?.id ?? 0;
  }

  /**
   * Set the last id for a table, e.g. when seeding.
   */
  public async setLastId(table: string, id: number): Promise<void> {
    await this.counters().updateOne(
      { collection: table },
      { $set: { id, collection: table } },
      { upsert: true },
    );
  }

  private counters() {
    return this.driver.getDatabase().collection<CounterDocument>(this.counterCollection);
  }
}
