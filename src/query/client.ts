import { createChecker } from "../schema/ajv.js";
import { MalformedResponseError, QueryError, TransportError, errorMessage } from "../core/errors.js";

export type Cell = string | number | boolean | null | Cell[];

export type QueryColumn = {
  name: string;
  type: string;
};

/** Result of a successful `/exec` call. */
export type QueryResponse = {
  query?: string;
  columns: QueryColumn[];
  dataset: Cell[][];
  count?: number;
};

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/** Anything that can run SQL and hand back a parsed response. */
export interface SqlQueryable {
  query(sql: string): Promise<QueryResponse>;
}

const RESPONSE_SCHEMA = {
  type: "object",
  required: ["columns", "dataset"],
  properties: {
    query: { type: "string" },
    columns: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "type"],
        properties: {
          name: { type: "string" },
          type: { type: "string" }
        }
      }
    },
    dataset: { type: "array", items: { type: "array", items: { $ref: "#/$defs/cell" } } },
    count: { type: "integer", minimum: 0 }
  },
  $defs: {
    cell: {
      type: ["string", "number", "boolean", "null", "array"],
      items: { $ref: "#/$defs/cell" }
    }
  }
};

const checkResponse = createChecker<QueryResponse>(RESPONSE_SCHEMA);

export const DEFAULT_QUERY_TIMEOUT_MS = 200;

export type QueryClientOptions = {
  /** Per-request timeout. */
  requestTimeoutMs?: number;
  fetch?: FetchFn;
};

/**
 * Client for a database instance's HTTP query endpoint.
 *
 * One request per call: no retry and no caching. Callers that need to wait
 * for data (see ConsistencyCheck) wrap it in the poller.
 */
export class QueryClient implements SqlQueryable {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(baseUrl: string, opts: QueryClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
    this.fetchFn = opts.fetch ?? fetch;
  }

  async query(sql: string): Promise<QueryResponse> {
    const url = `${this.baseUrl}/exec?${new URLSearchParams({ query: sql }).toString()}`;

    let res: Response;
    try {
      res = await this.fetchFn(url, { signal: AbortSignal.timeout(this.requestTimeoutMs) });
    } catch (e) {
      throw new TransportError(`Request failed for ${JSON.stringify(sql)}: ${errorMessage(e)}`, null, { cause: e });
    }

    if (res.status !== 200) {
      throw new TransportError(`Error response ${res.status} from ${JSON.stringify(sql)}`, res.status);
    }

    let raw: string;
    try {
      raw = await res.text();
    } catch (e) {
      throw new TransportError(`Failed reading response body for ${JSON.stringify(sql)}: ${errorMessage(e)}`, res.status, { cause: e });
    }

    return parseQueryResponse(raw, sql);
  }

  /** True if the server answers `GET /` with 200. */
  async ping(): Promise<boolean> {
    try {
      const res = await this.fetchFn(`${this.baseUrl}/`, { signal: AbortSignal.timeout(this.requestTimeoutMs) });
      return res.status === 200;
    } catch {
      return false;
    }
  }
}

/**
 * Parse an `/exec` body. Server-side errors become QueryError; anything
 * that is not a well-formed result set becomes MalformedResponseError.
 */
export function parseQueryResponse(raw: string, sql: string): QueryResponse {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new MalformedResponseError(errorMessage(e), raw, { cause: e });
  }

  if (typeof data === "object" && data !== null && "error" in data && typeof data.error === "string") {
    const position = "position" in data && typeof data.position === "number" ? data.position : null;
    throw new QueryError(data.error, sql, position);
  }

  const checked = checkResponse(data);
  if (!checked.ok) throw new MalformedResponseError(checked.errors, raw);

  const response = checked.value;
  const arity = response.columns.length;
  response.dataset.forEach((row, i) => {
    if (row.length !== arity) {
      throw new MalformedResponseError(`row ${i} has ${row.length} values, expected ${arity}`, raw);
    }
  });

  return response;
}
