import axios, { isAxiosError, type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import {
  EslStoreError,
  IoError,
  PlatformError,
  SerializationError,
  TransportError,
  UrlError,
  ConfigError,
  isEslStoreError,
} from "../../../errors.js";
import { createLogger, type Logger } from "../../logger.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ParseClientConfig {
  /** Sent as X-Parse-Application-Id on every request */
  applicationId: string;
  /** Sent as X-Parse-REST-API-Key when set */
  apiKey?: string;
  /** Root the object paths are appended to, e.g. https://host/parse/classes */
  serverUrl: string;
  timeoutMs?: number;
  logger?: Logger;
}

/** Body of a 201 answer to a create */
export const ParseCreatedSchema = z.object({
  createdAt: z.string(),
  objectId: z.string(),
});

export type ParseCreated = z.infer<typeof ParseCreatedSchema>;

/** Body of a 200 answer to a query */
const QueryResponseSchema = z.object({
  results: z.array(z.unknown()),
});

/** Body Parse sends with every error status */
const ParseErrorResponseSchema = z.object({
  code: z.number(),
  error: z.string(),
});

/**
 * Query constraints, e.g.
 * `{"serial": "DEV-42", "printed": false, "createdAt": {"$gt": ..., "$lt": ...}}`
 *
 * @see https://docs.parseplatform.org/rest/guide/#queries
 */
export type ParseWhere = Record<string, unknown>;

// Failures where the request never got an answer
const TRANSPORT_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "ERR_NETWORK",
]);

// Visible ASCII and spaces/tabs; anything else cannot go in a header
const HEADER_VALUE_PATTERN = /^[\t\x20-\x7e]*$/;

function headerValue(name: string, value: string): string {
  if (!HEADER_VALUE_PATTERN.test(value)) {
    throw new ConfigError(
      `Cannot encode the ${name} into a request header`,
      undefined,
      "Header values may only contain printable ASCII characters",
    );
  }
  return value;
}

/**
 * A small client for the Parse Server REST API: create, query and update on
 * object paths under one server root.
 */
export class ParseClient {
  private http: AxiosInstance;
  private logger: Logger;
  readonly serverUrl: string;

  constructor(config: ParseClientConfig) {
    this.serverUrl = config.serverUrl.replace(/\/+$/, "");
    this.logger = config.logger ?? createLogger();

    const headers: Record<string, string> = {
      "X-Parse-Application-Id": headerValue("application ID", config.applicationId),
    };
    if (config.apiKey) {
      headers["X-Parse-REST-API-Key"] = headerValue("REST API key", config.apiKey);
    }
    this.logger.debug(
      "Forged request headers",
      config.apiKey ? { ...headers, "X-Parse-REST-API-Key": "<redacted>" } : headers,
    );

    this.http = axios.create({
      headers,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      // Bodies are decoded and validated here, statuses are checked here
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  /**
   * Joins an object path onto the server root.
   * @throws {UrlError} If the root is not an absolute http(s) URL
   */
  getUrl(path: string): string {
    let root: URL;
    try {
      root = new URL(this.serverUrl);
    } catch (err) {
      throw new UrlError(this.serverUrl, err);
    }
    if (root.protocol !== "http:" && root.protocol !== "https:") {
      throw new UrlError(this.serverUrl);
    }

    const formatted = `${this.serverUrl}/${path.replace(/^\/+/, "")}`;
    this.logger.debug(`Formatted url ${formatted}`);
    return formatted;
  }

  /**
   * Create an object with a POST. Parse answers 201 with the new objectId.
   */
  async create(path: string, data: unknown): Promise<ParseCreated> {
    const url = this.getUrl(path);
    const body = this.encode(data);
    this.logger.debug(`Saving object to ${url}: ${body}`);

    const response = await this.send(() => this.http.post<unknown>(url, body, jsonHeaders));
    if (response.status !== 201) {
      throw this.platformError(response);
    }
    return this.decode(response, ParseCreatedSchema);
  }

  /**
   * Find objects with a GET; the constraints travel JSON-encoded in `where`.
   */
  async query(path: string, where: ParseWhere): Promise<unknown[]> {
    const url = new URL(this.getUrl(path));
    url.searchParams.append("where", this.encode(where));

    const response = await this.send(() => this.http.get<unknown>(url.toString()));
    if (response.status !== 200) {
      throw this.platformError(response);
    }
    return this.decode(response, QueryResponseSchema).results;
  }

  /**
   * Partially update an object with a PUT. The body of the 200 is not used.
   */
  async update(path: string, data: unknown): Promise<void> {
    const url = this.getUrl(path);
    const body = this.encode(data);

    const response = await this.send(() => this.http.put<unknown>(url, body, jsonHeaders));
    if (response.status !== 200) {
      throw this.platformError(response);
    }
  }

  private encode(data: unknown): string {
    let body: string | undefined;
    try {
      body = JSON.stringify(data);
    } catch (err) {
      throw new SerializationError("Failed to convert the payload to JSON", err);
    }
    if (body === undefined) {
      throw new SerializationError("Payload has no JSON representation");
    }
    return body;
  }

  private decode<T>(
    response: AxiosResponse<unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): T {
    const result = schema.safeParse(parseJsonBody(response));
    if (!result.success) {
      throw new SerializationError(
        `Unexpected response body (status ${response.status}): ${result.error.message}`,
      );
    }
    return result.data;
  }

  private platformError(response: AxiosResponse<unknown>): EslStoreError {
    const body = ParseErrorResponseSchema.safeParse(parseJsonBody(response));
    if (!body.success) {
      return new SerializationError(
        `Parse answered ${response.status} without an error body`,
        body.error,
      );
    }
    return new PlatformError(response.status, body.data.error, body.data.code);
  }

  private async send(
    request: () => Promise<AxiosResponse<unknown>>,
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await request();
    } catch (err) {
      throw toStoreError(err);
    }
  }
}

const jsonHeaders = { headers: { "Content-Type": "application/json" } };

/**
 * Response bodies are kept as text by the axios instance.
 * @throws {SerializationError} If the body is not JSON
 */
function parseJsonBody(response: AxiosResponse<unknown>): unknown {
  const raw = response.data;
  if (typeof raw !== "string") {
    return raw;
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new SerializationError(
      `Response body (status ${response.status}) is not valid JSON`,
      err,
    );
  }
}

function toStoreError(err: unknown): EslStoreError {
  if (isEslStoreError(err)) {
    return err;
  }
  if (isAxiosError(err)) {
    if (err.code && TRANSPORT_ERROR_CODES.has(err.code)) {
      return new TransportError(
        `An issue occurred within this request: ${err.message}`,
        err,
        "Check that the Parse server is reachable",
      );
    }
    return new IoError(`An I/O error occurred: ${err.message}`, err);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new IoError(`An I/O error occurred: ${message}`, err);
}
