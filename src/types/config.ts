/** Configuration types for the layered config (base.yaml ← env.yaml ← ILPCOMPAT_* env). */
export type CatalogConfig = {
  api_url: string;
  repo: string;
  asset_suffix: string;
  /** Catalog window searched when versions are given explicitly. */
  explicit_lookback: number;
  default_last_n: number;
  list_default: number;
  token?: string;
};

export type TimeoutsConfig = {
  start_sec: number;
  stop_sec: number;
  table_sec: number;
  query_ms: number;
};

export type HarnessConfig = {
  schema_version: string;
  install_dir: string;
  reports_dir: string;
  host: string;
  java?: string;
  catalog: CatalogConfig;
  timeouts: TimeoutsConfig;
  poll: { interval_ms: number };
  matrix: { abort_on_failure: boolean };
  consistency: { strict_query_errors: boolean };
};
