export interface ApiError {
  status: number;
  message: string;
  body?: unknown;
}

export type ApiResult<T> = { ok: true; data: T } | { ok: false; error: ApiError };

/** Query dictionary; `undefined` and `null` entries are left out of the URL. */
export type QueryParams = Record<string, string | number | boolean | undefined | null>;

/** Passthrough JSON object returned by most endpoints. */
export type JsonObject = Record<string, unknown>;

export type Id = number | string;
