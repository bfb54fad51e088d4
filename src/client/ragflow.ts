import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from "axios";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { z } from "zod";
import type { RagflowConfig } from "../core/config.js";
import type { DocumentService } from "../core/batch-upload.js";
import {
  APIError,
  AuthenticationError,
  ResourceNotFoundError,
  ValidationError,
} from "./errors.js";
import {
  datasetSchema,
  documentSchema,
  envelopeSchema,
  type Dataset,
  type Envelope,
  type ListDatasetsQuery,
  type RagflowDocument,
} from "./models.js";

export interface RagflowClientOptions {
  /** Replaces axios's HTTP transport. Tests use this to answer in process. */
  adapter?: AxiosAdapter;
}

/** Join a base URL and a path with exactly one slash between them */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

function messageOf(body: unknown): string | undefined {
  if (typeof body === "object" && body !== null && "message" in body) {
    return typeof body.message === "string" ? body.message : undefined;
  }
  return undefined;
}

/**
 * Map an HTTP response onto the envelope or the matching error.
 * Every endpoint answers `{ code, message?, data? }`; code 0 is success.
 */
export function checkResponse(res: AxiosResponse<unknown>): Envelope {
  const body = res.data;
  const message = messageOf(body);

  if (res.status === 401) throw new AuthenticationError(message ?? "Authentication failed");
  if (res.status === 404) throw new ResourceNotFoundError(message ?? "Resource not found");
  if (res.status >= 400) throw new APIError(`API request failed: ${message ?? "Unknown error"}`);

  if (typeof body !== "object" || body === null) {
    throw new APIError(`Invalid JSON response: ${String(body)}`);
  }

  const parsed = envelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(`Unexpected response shape: ${JSON.stringify(body)}`);
  }

  const envelope = parsed.data;
  if (envelope.code !== 0) {
    throw new APIError(`API request failed: ${envelope.message ?? "Unknown error"}`, envelope.code);
  }
  return envelope;
}

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ValidationError(`Unexpected ${what} payload${where}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

/** Typed client for the dataset, document and parsing endpoints of RAGFlow's HTTP API. */
export class RagflowClient implements DocumentService {
  readonly baseUrl: string;
  private readonly http: AxiosInstance;

  constructor(config: RagflowConfig, options: RagflowClientOptions = {}) {
    if (!config.apiKey) {
      throw new AuthenticationError("API key is required");
    }
    this.baseUrl = config.baseUrl;
    this.http = axios.create({
      timeout: config.timeoutMs,
      headers: { Authorization: `Bearer ${config.apiKey}` },
      // status codes are mapped to errors in checkResponse
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  private async request(config: AxiosRequestConfig & { url: string }): Promise<Envelope> {
    const res = await this.http.request<unknown>({
      ...config,
      url: joinUrl(this.baseUrl, config.url),
    });
    return checkResponse(res);
  }

  async listDatasets(query: ListDatasetsQuery = {}): Promise<Dataset[]> {
    const params: Record<string, string | number | boolean> = {
      page: query.page ?? 1,
      page_size: query.pageSize ?? 30,
      orderby: query.orderby ?? "create_time",
      desc: query.desc ?? true,
    };
    if (query.name) params.name = query.name;
    if (query.id) params.id = query.id;

    const envelope = await this.request({ method: "GET", url: "/api/v1/datasets", params });
    return parsePayload(z.array(datasetSchema), envelope.data ?? [], "dataset list");
  }

  /**
   * Upload local files into a dataset, one multipart `file` part per path.
   * Each file is read right before the request and not held afterwards.
   */
  async uploadDocuments(datasetId: string, filePaths: string[]): Promise<RagflowDocument[]> {
    const form = new FormData();
    for (const path of filePaths) {
      const content = await readFile(path);
      form.append("file", new Blob([content]), basename(path));
    }

    const envelope = await this.request({
      method: "POST",
      url: `/api/v1/datasets/${encodeURIComponent(datasetId)}/documents`,
      data: form,
    });
    return parsePayload(z.array(documentSchema), envelope.data ?? [], "document list");
  }

  /** Queue documents for chunking. The server answers right away; parsing runs in the background. */
  async parseDocuments(datasetId: string, documentIds: string[]): Promise<Envelope> {
    return this.request({
      method: "POST",
      url: `/api/v1/datasets/${encodeURIComponent(datasetId)}/chunks`,
      data: { document_ids: documentIds },
    });
  }
}
