import { createClient, SupabaseClient } from '@supabase/supabase-js';
import type { PostgrestError } from '@supabase/supabase-js';
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

const RESTAURANTS = 'restaurants';
const LLM_INFO = 'restaurant_llm_info';
const WITH_LLM_INFO = `*, llm_info:${LLM_INFO}(*)`;

type EmbeddedRow = RestaurantRow & { llm_info: LlmInfoRow | LlmInfoRow[] | null };

function check(error: PostgrestError | null, what: string): void {
  if (error) throw new StoreError(`${what} failed: ${error.message}`, error);
}

function restaurantColumns(input: RestaurantUpdate): RestaurantUpdate {
  const cols: RestaurantUpdate = {};
  if (input.name !== undefined) cols.name = input.name;
  if (input.description !== undefined) cols.description = input.description;
  if (input.address !== undefined) cols.address = input.address;
  if (input.source !== undefined) cols.source = input.source;
  if (input.source_url !== undefined) cols.source_url = input.source_url;
  return cols;
}

function llmInfoColumns(input: LlmInfoInput): LlmInfoInput {
  const cols: LlmInfoInput = {};
  if (input.cuisine !== undefined) cols.cuisine = input.cuisine;
  if (input.vibe !== undefined) cols.vibe = input.vibe;
  if (input.llm_model_version !== undefined) cols.llm_model_version = input.llm_model_version;
  return cols;
}

// PostgREST embeds a one-to-one relation as an object, older servers as a one-element array.
function unembed(row: EmbeddedRow): RestaurantWithLlmInfo {
  const info = Array.isArray(row.llm_info) ? row.llm_info[0] ?? null : row.llm_info;
  return { ...row, llm_info: info };
}

export class SupabaseRestaurantStore implements RestaurantStore {
  constructor(private readonly client: SupabaseClient) {}

  async findRestaurantByAddress(address: string): Promise<RestaurantRow | null> {
    const { data, error } = await this.client
      .from(RESTAURANTS)
      .select('*')
      .eq('address', address)
      .order('id', { ascending: true })
      .limit(1)
      .maybeSingle<RestaurantRow>();
    check(error, 'findRestaurantByAddress');
    return data;
  }

  async getRestaurant(id: RestaurantId): Promise<RestaurantRow | null> {
    const { data, error } = await this.client.from(RESTAURANTS).select('*').eq('id', id).maybeSingle<RestaurantRow>();
    check(error, 'getRestaurant');
    return data;
  }

  async getRestaurantByName(name: string): Promise<RestaurantRow | null> {
    const { data, error } = await this.client
      .from(RESTAURANTS)
      .select('*')
      .eq('name', name)
      .order('id', { ascending: true })
      .limit(1)
      .maybeSingle<RestaurantRow>();
    check(error, 'getRestaurantByName');
    return data;
  }

  async listRestaurants(page?: PageInput): Promise<RestaurantRow[]> {
    const { skip, limit } = resolvePage(page);
    const { data, error } = await this.client
      .from(RESTAURANTS)
      .select('*')
      .order('id', { ascending: true })
      .range(skip, skip + limit - 1)
      .returns<RestaurantRow[]>();
    check(error, 'listRestaurants');
    return data ?? [];
  }

  async createRestaurant(input: RestaurantInput): Promise<RestaurantRow> {
    const { data, error } = await this.client
      .from(RESTAURANTS)
      .insert(restaurantColumns(input))
      .select('*')
      .single<RestaurantRow>();
    check(error, 'createRestaurant');
    if (!data) throw new StoreError('createRestaurant returned no row');
    return data;
  }

  async updateRestaurant(id: RestaurantId, update: RestaurantUpdate): Promise<RestaurantRow | null> {
    const { data, error } = await this.client
      .from(RESTAURANTS)
      .update(restaurantColumns(update))
      .eq('id', id)
      .select('*')
      .maybeSingle<RestaurantRow>();
    check(error, 'updateRestaurant');
    return data;
  }

  async deleteRestaurant(id: RestaurantId): Promise<boolean> {
    const { data, error } = await this.client
      .from(RESTAURANTS)
      .delete()
      .eq('id', id)
      .select('id')
      .returns<Array<{ id: RestaurantId }>>();
    check(error, 'deleteRestaurant');
    return (data ?? []).length > 0;
  }

  async createLlmInfo(restaurantId: RestaurantId, input: LlmInfoInput): Promise<LlmInfoRow> {
    if (!(await this.getRestaurant(restaurantId))) {
      throw new NotFoundError(`Restaurant with id ${restaurantId} does not exist`);
    }
    const existing = await this.updateLlmInfo(restaurantId, input);
    if (existing) return existing;

    const { data, error } = await this.client
      .from(LLM_INFO)
      .insert({ ...llmInfoColumns(input), restaurant_id: restaurantId })
      .select('*')
      .single<LlmInfoRow>();
    check(error, 'createLlmInfo');
    if (!data) throw new StoreError('createLlmInfo returned no row');
    return data;
  }

  async getLlmInfo(restaurantId: RestaurantId): Promise<LlmInfoRow | null> {
    const { data, error } = await this.client
      .from(LLM_INFO)
      .select('*')
      .eq('restaurant_id', restaurantId)
      .maybeSingle<LlmInfoRow>();
    check(error, 'getLlmInfo');
    return data;
  }

  async updateLlmInfo(restaurantId: RestaurantId, input: LlmInfoInput): Promise<LlmInfoRow | null> {
    const { data, error } = await this.client
      .from(LLM_INFO)
      .update(llmInfoColumns(input))
      .eq('restaurant_id', restaurantId)
      .select('*')
      .maybeSingle<LlmInfoRow>();
    check(error, 'updateLlmInfo');
    return data;
  }

  async deleteLlmInfo(restaurantId: RestaurantId): Promise<boolean> {
    const { data, error } = await this.client
      .from(LLM_INFO)
      .delete()
      .eq('restaurant_id', restaurantId)
      .select('restaurant_id')
      .returns<Array<{ restaurant_id: RestaurantId }>>();
    check(error, 'deleteLlmInfo');
    return (data ?? []).length > 0;
  }

  async getRestaurantWithLlmInfo(id: RestaurantId): Promise<RestaurantWithLlmInfo | null> {
    const { data, error } = await this.client
      .from(RESTAURANTS)
      .select(WITH_LLM_INFO)
      .eq('id', id)
      .maybeSingle<EmbeddedRow>();
    check(error, 'getRestaurantWithLlmInfo');
    return data ? unembed(data) : null;
  }

  async listRestaurantsWithLlmInfo(page?: PageInput): Promise<RestaurantWithLlmInfo[]> {
    const { skip, limit } = resolvePage(page);
    const { data, error } = await this.client
      .from(RESTAURANTS)
      .select(WITH_LLM_INFO)
      .order('id', { ascending: true })
      .range(skip, skip + limit - 1)
      .returns<EmbeddedRow[]>();
    check(error, 'listRestaurantsWithLlmInfo');
    return (data ?? []).map(unembed);
  }

  async close(): Promise<void> {
    await this.client.removeAllChannels();
  }
}

/**
 * One service-role client per acquired session. Sessions are never shared
 * between concurrent scrape tasks.
 */
export class SupabaseStoreProvider implements StoreProvider {
  constructor(private readonly url: string, private readonly serviceRoleKey: string) {}

  acquire(): RestaurantStore {
    const client = createClient(this.url, this.serviceRoleKey, {
      auth: { persistSession: false, detectSessionInUrl: false, autoRefreshToken: false },
    });
    return new SupabaseRestaurantStore(client);
  }
}
