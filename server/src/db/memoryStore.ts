import { NotFoundError, StoreError } from '../errors';
import type {
  LlmInfoInput,
  LlmInfoRow,
  PageInput,
  RestaurantId,
  RestaurantInput,
  RestaurantRow,
  RestaurantUpdate,
  RestaurantWithLlmInfo,
} from '../types';
import { resolvePage } from './store';
import type { RestaurantStore, StoreProvider } from './store';

interface Tables {
  nextId: number;
  restaurants: Map<RestaurantId, RestaurantRow>;
  llmInfo: Map<RestaurantId, LlmInfoRow>;
}

function copyOrNull<T extends object>(row: T | undefined): T | null {
  return row ? { ...row } : null;
}

/**
 * Process-local store with the same column rules as the Supabase schema
 * (name and address NOT NULL, cascading detail delete). Used for dry runs.
 */
export class InMemoryRestaurantStore implements RestaurantStore {
  private closed = false;

  constructor(
    private readonly tables: Tables = { nextId: 1, restaurants: new Map(), llmInfo: new Map() },
    private readonly now: () => Date = () => new Date(),
    private readonly onClose?: () => void,
  ) {}

  private assertOpen(): void {
    if (this.closed) throw new StoreError('Store session is closed');
  }

  private sorted(): RestaurantRow[] {
    return [...this.tables.restaurants.values()].sort((a, b) => a.id - b.id).map((r) => ({ ...r }));
  }

  async findRestaurantByAddress(address: string): Promise<RestaurantRow | null> {
    this.assertOpen();
    return this.sorted().find((r) => r.address === address) ?? null;
  }

  async getRestaurant(id: RestaurantId): Promise<RestaurantRow | null> {
    this.assertOpen();
    const row = this.tables.restaurants.get(id);
    return row ? { ...row } : null;
  }

  async getRestaurantByName(name: string): Promise<RestaurantRow | null> {
    this.assertOpen();
    return this.sorted().find((r) => r.name === name) ?? null;
  }

  async listRestaurants(page?: PageInput): Promise<RestaurantRow[]> {
    this.assertOpen();
    const { skip, limit } = resolvePage(page);
    return this.sorted().slice(skip, skip + limit);
  }

  async createRestaurant(input: RestaurantInput): Promise<RestaurantRow> {
    this.assertOpen();
    if (!input.name) throw new StoreError('createRestaurant failed: name is required');
    if (!input.address) throw new StoreError('createRestaurant failed: address is required');
    const ts = this.now().toISOString();
    const row: RestaurantRow = {
      id: this.tables.nextId++,
      name: input.name,
      description: input.description ?? null,
      address: input.address,
      source: input.source ?? null,
      source_url: input.source_url ?? null,
      created_at: ts,
      updated_at: ts,
    };
    this.tables.restaurants.set(row.id, row);
    return { ...row };
  }

  async updateRestaurant(id: RestaurantId, update: RestaurantUpdate): Promise<RestaurantRow | null> {
    this.assertOpen();
    const current = this.tables.restaurants.get(id);
    if (!current) return null;
    const name = update.name === undefined ? current.name : update.name;
    const address = update.address === undefined ? current.address : update.address;
    if (!name) throw new StoreError('updateRestaurant failed: name is required');
    if (!address) throw new StoreError('updateRestaurant failed: address is required');
    const row: RestaurantRow = {
      ...current,
      name,
      address,
      description: update.description === undefined ? current.description : update.description,
      source: update.source === undefined ? current.source : update.source,
      source_url: update.source_url === undefined ? current.source_url : update.source_url,
      updated_at: this.now().toISOString(),
    };
    this.tables.restaurants.set(id, row);
    return { ...row };
  }

  async deleteRestaurant(id: RestaurantId): Promise<boolean> {
    this.assertOpen();
    this.tables.llmInfo.delete(id);
    return this.tables.restaurants.delete(id);
  }

  async createLlmInfo(restaurantId: RestaurantId, input: LlmInfoInput): Promise<LlmInfoRow> {
    this.assertOpen();
    if (!this.tables.restaurants.has(restaurantId)) {
      throw new NotFoundError(`Restaurant with id ${restaurantId} does not exist`);
    }
    const existing = await this.updateLlmInfo(restaurantId, input);
    if (existing) return existing;
    const row: LlmInfoRow = {
      restaurant_id: restaurantId,
      cuisine: input.cuisine ?? null,
      vibe: input.vibe ?? null,
      llm_model_version: input.llm_model_version ?? null,
      generated_at: this.now().toISOString(),
    };
    this.tables.llmInfo.set(restaurantId, row);
    return { ...row };
  }

  async getLlmInfo(restaurantId: RestaurantId): Promise<LlmInfoRow | null> {
    this.assertOpen();
    const row = this.tables.llmInfo.get(restaurantId);
    return row ? { ...row } : null;
  }

  async updateLlmInfo(restaurantId: RestaurantId, input: LlmInfoInput): Promise<LlmInfoRow | null> {
    this.assertOpen();
    const current = this.tables.llmInfo.get(restaurantId);
    if (!current) return null;
    const row: LlmInfoRow = {
      ...current,
      cuisine: input.cuisine === undefined ? current.cuisine : input.cuisine,
      vibe: input.vibe === undefined ? current.vibe : input.vibe,
      llm_model_version: input.llm_model_version === undefined ? current.llm_model_version : input.llm_model_version,
    };
    this.tables.llmInfo.set(restaurantId, row);
    return { ...row };
  }

  async deleteLlmInfo(restaurantId: RestaurantId): Promise<boolean> {
    this.assertOpen();
    return this.tables.llmInfo.delete(restaurantId);
  }

  async getRestaurantWithLlmInfo(id: RestaurantId): Promise<RestaurantWithLlmInfo | null> {
    const row = await this.getRestaurant(id);
    if (!row) return null;
    return { ...row, llm_info: await this.getLlmInfo(id) };
  }

  async listRestaurantsWithLlmInfo(page?: PageInput): Promise<RestaurantWithLlmInfo[]> {
    const rows = await this.listRestaurants(page);
    return rows.map((row) => ({ ...row, llm_info: copyOrNull(this.tables.llmInfo.get(row.id)) }));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.onClose?.();
  }
}

/** Sessions over one shared set of tables; each acquire() is a separate, closable session. */
export class InMemoryStoreProvider implements StoreProvider {
  private readonly tables: Tables = { nextId: 1, restaurants: new Map(), llmInfo: new Map() };
  acquired = 0;
  released = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  acquire(): RestaurantStore {
    this.acquired++;
    return new InMemoryRestaurantStore(this.tables, this.now, () => {
      this.released++;
    });
  }
}
