/**
 * Remote store over HTTP
 *
 * Every request carries the X-API-Key header. Answers are passed through as
 * status/body pairs; only a failed round trip throws.
 */

import { ErrorCode, RemoteStoreError } from "../../errors.js";
import { isSuccessStatus, type IRemoteStore, type TaxonomyListing } from "../../interfaces/index.js";
import { snapshotFromTree } from "../../taxonomy/models/taxonomy.js";
import { TaxonomyResponseSchema, formatIssues } from "../../../utils/validation.js";
import { createLogger, type Logger } from "../../../utils/logger.js";
import type {
  FinancialEntryPayload,
  RecordType,
  RemoteResource,
  ReplacePayload,
  StoreResponse,
} from "../../../types/index.js";

const defaultLogger = createLogger("store");

type HttpMethod = "GET" | "POST" | "PUT";

/**
 * Path of each wholesale resource, relative to the base URL
 */
export const RESOURCE_PATHS: Record<RemoteResource, string> = {
  records: "",
  transactions: "/finance/transactions",
  categories: "/finance/categories",
};

export interface HttpRemoteStoreOptions {
  baseUrl: string;
  apiKey: string;
  logger?: Logger;
}

export class HttpRemoteStore implements IRemoteStore {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly logger: Logger;

  constructor(options: HttpRemoteStoreOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.logger = options.logger ?? defaultLogger;
  }

  fetch(resource: RemoteResource, query?: Record<string, string>): Promise<StoreResponse> {
    return this.request("GET", RESOURCE_PATHS[resource], undefined, query);
  }

  replace(resource: RemoteResource, payload: ReplacePayload): Promise<StoreResponse> {
    return this.request("PUT", RESOURCE_PATHS[resource], payload);
  }

  createRecord(type: RecordType, body: string): Promise<StoreResponse> {
    return this.request("POST", RESOURCE_PATHS.records, { type, body });
  }

  submitEntry(payload: FinancialEntryPayload): Promise<StoreResponse> {
    return this.request("POST", RESOURCE_PATHS.transactions, payload);
  }

  createCategory(name: string): Promise<StoreResponse> {
    return this.request("POST", RESOURCE_PATHS.categories, { name });
  }

  createSubcategory(category: string, name: string): Promise<StoreResponse> {
    return this.request(
      "POST",
      `${RESOURCE_PATHS.categories}/${encodeURIComponent(category)}/subcategories`,
      { name }
    );
  }

  async listTaxonomy(): Promise<TaxonomyListing> {
    const response = await this.fetch("categories");
    if (!isSuccessStatus(response.status)) {
      return { ok: false, status: response.status, body: response.body };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(response.body);
    } catch {
      throw new RemoteStoreError("Category listing is not JSON", ErrorCode.REMOTE_INVALID_RESPONSE, {
        body: response.body,
      });
    }

    const parsed = TaxonomyResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RemoteStoreError(
        `Unexpected category listing: ${formatIssues(parsed.error).join("; ")}`,
        ErrorCode.REMOTE_INVALID_RESPONSE
      );
    }
    return { ok: true, status: response.status, snapshot: snapshotFromTree(parsed.data.categories) };
  }

  private async request(
    method: HttpMethod,
    path: string,
    payload?: unknown,
    query?: Record<string, string>
  ): Promise<StoreResponse> {
    const search = query ? `?${new URLSearchParams(query).toString()}` : "";
    const url = `${this.baseUrl}${path}${search}`;

    this.logger.debug({ method, url }, "Request");

    let response: StoreResponse;
    try {
      const res = await fetch(url, {
        method,
        headers: {
          "X-API-Key": this.apiKey,
          "Content-Type": "application/json",
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
      });
      response = { status: res.status, body: await res.text() };
    } catch (error) {
      this.logger.error({ err: error, method, url }, "Request failed");
      throw new RemoteStoreError(
        `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.REMOTE_UNREACHABLE,
        { url }
      );
    }

    this.logger.info({ method, url, status: response.status }, "Response");
    return response;
  }
}
