import type { GenerateIdOptions, IdGeneratorContract } from "../../contracts";

/**
 * Per-table counters kept in process.
 */
export class MemoryIdGenerator implements IdGeneratorContract {
  private readonly lastIds = new Map<string, number>();

  public async generateNextId(options: GenerateIdOptions): Promise<number> {
    const { table, initialId = 1, incrementIdBy = 1 } = options;
    const lastId = this.lastIds.get(table);
    const id = lastId === undefined ? initialId : lastId + incrementIdBy;

    this.lastIds.set(table, id);

    return id;
  }

  public async getLastId(table: string): Promise<number> {
    return this.lastIds.get(table) ?? 0;
  }

  public async setLastId(table: string, id: number): Promise<void> {
    this.lastIds.set(table, id);
  }

  public reset(): void {
    this.lastIds.clear();
  }
}
