export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface BackendSuccess {
  ok: true;
  data: JsonValue;
}

export interface BackendFailure {
  ok: false;
  errorMessage: string;
  /** Body text as received, when there was one to keep. */
  rawBody?: string;
}

/** Outcome of any call to the backend service. */
export type BackendResult = BackendSuccess | BackendFailure;

export type HttpMethod = 'GET' | 'POST';
