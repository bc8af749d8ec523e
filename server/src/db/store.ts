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

export const DEFAULT_PAGE: Required<PageInput> = { skip: 0, limit: 100 };

/**
 * Persistence surface used by reconciliation and the API.
 *
 * Address lookup is an exact string comparison. Nothing in the schema makes
 * addresses unique; reconciliation is what keeps one row per address.
 */
export interface RestaurantStore {
  findRestaurantByAddress(address: string): Promise<RestaurantRow | null>;
  getRestaurant(id: RestaurantId): Promise<RestaurantRow | null>;
  getRestaurantByName(name: string): Promise<RestaurantRow | null>;
  listRestaurants(page?: PageInput): Promise<RestaurantRow[]>;
  createRestaurant(input: RestaurantInput): Promise<RestaurantRow>;
  updateRestaurant(id: RestaurantId, update: RestaurantUpdate): Promise<RestaurantRow | null>;
  deleteRestaurant(id: RestaurantId): Promise<boolean>;

  /** Creates the detail row, or updates it when one exists. Throws NotFoundError for an unknown restaurant. */
  createLlmInfo(restaurantId: RestaurantId, input: LlmInfoInput): Promise<LlmInfoRow>;
  getLlmInfo(restaurantId: RestaurantId): Promise<LlmInfoRow | null>;
  updateLlmInfo(restaurantId: RestaurantId, input: LlmInfoInput): Promise<LlmInfoRow | null>;
  deleteLlmInfo(restaurantId: RestaurantId): Promise<boolean>;
  getRestaurantWithLlmInfo(id: RestaurantId): Promise<RestaurantWithLlmInfo | null>;
  listRestaurantsWithLlmInfo(page?: PageInput): Promise<RestaurantWithLlmInfo[]>;

  /** Release the underlying session. The store must not be used afterwards. */
  close(): Promise<void>;
}

/** Hands out one store session per unit of work. */
export interface StoreProvider {
  acquire(): RestaurantStore;
}

/** Run `fn` with a fresh session, releasing it on every exit path. */
export async function withStore<T>(provider: StoreProvider, fn: (store: RestaurantStore) => Promise<T>): Promise<T> {
  const store = provider.acquire();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

export function resolvePage(page: PageInput = {}): Required<PageInput> {
  const skip = Math.max(0, Math.floor(page.skip ?? DEFAULT_PAGE.skip));
  const limit = Math.max(1, Math.floor(page.limit ?? DEFAULT_PAGE.limit));
  return { skip, limit };
}
