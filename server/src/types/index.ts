export type RestaurantId = number;

/** A JSON-LD `item` that describes a restaurant on a map page. */
export interface RestaurantListing {
  '@type': string;
  name?: string | null;
  url?: string | null;
  [key: string]: unknown;
}

export interface MapCardFields {
  address: string | null;
  description: string | null;
}

// The key set here is the contract with reconciliation and TSV export.
export interface RestaurantRecord {
  name: string | null;
  description: string | null;
  source: string | null;
  source_url: string;
  address: string;
}

export interface RestaurantInput {
  name: string | null;
  description?: string | null;
  address: string;
  source?: string | null;
  source_url?: string | null;
}

export type RestaurantUpdate = Partial<RestaurantInput>;

export interface RestaurantRow {
  id: RestaurantId;
  name: string;
  description: string | null;
  address: string;
  source: string | null;
  source_url: string | null;
  created_at: string;
  updated_at: string;
}

export interface LlmInfoInput {
  cuisine?: string | null;
  vibe?: string | null;
  llm_model_version?: string | null;
}

export interface LlmInfoRow {
  restaurant_id: RestaurantId;
  cuisine: string | null;
  vibe: string | null;
  llm_model_version: string | null;
  generated_at: string;
}

export interface RestaurantWithLlmInfo extends RestaurantRow {
  llm_info: LlmInfoRow | null;
}

export interface PageInput {
  skip?: number;
  limit?: number;
}

export type ReconcileAction = 'created' | 'updated';

export interface ReconcileResult {
  action: ReconcileAction;
  restaurant: RestaurantRow;
}

export type UrlOutcome =
  | { url: string; status: 'ok'; records: number; created: number; updated: number }
  | { url: string; status: 'failed'; error: string };

export interface BatchReport {
  total: number;
  succeeded: number;
  failed: number;
  outcomes: UrlOutcome[];
}
