/**
 * Shared test helpers.
 *
 * FakeDocumentService stands in for the RAGFlow server: it keeps the
 * datasets it was given, hands out sequential document ids, and records
 * every call so suites can assert on what would have gone over the wire.
 */
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { tmpdir } from "node:os";
import type { AxiosAdapter, InternalAxiosRequestConfig } from "axios";
import type { DocumentService } from "../../src/core/batch-upload.js";
import type { Log } from "../../src/core/log.js";
import type { Dataset, Envelope, ListDatasetsQuery, RagflowDocument } from "../../src/client/models.js";

export function dataset(id: string, name: string): Dataset {
  return { id, name };
}

export class FakeDocumentService implements DocumentService {
  readonly uploads: string[] = [];
  readonly parseCalls: { datasetId: string; documentIds: string[] }[] = [];
  /** basename → error thrown when that file is uploaded */
  readonly failOn = new Map<string, Error>();
  /** basenames whose upload answers with an empty document list */
  readonly emptyOn = new Set<string>();
  private nextId = 1;

  constructor(private readonly datasets: Dataset[] = []) {}

  async listDatasets(query: ListDatasetsQuery): Promise<Dataset[]> {
    return this.datasets.filter((d) => query.name === undefined || d.name === query.name);
  }

  async uploadDocuments(datasetId: string, filePaths: string[]): Promise<RagflowDocument[]> {
    const docs: RagflowDocument[] = [];
    for (const path of filePaths) {
      const name = basename(path);
      this.uploads.push(name);
      const failure = this.failOn.get(name);
      if (failure) throw failure;
      if (this.emptyOn.has(name)) continue;
      docs.push({ id: `doc-${this.nextId++}`, name, dataset_id: datasetId });
    }
    return docs;
  }

  async parseDocuments(datasetId: string, documentIds: string[]): Promise<Envelope> {
    this.parseCalls.push({ datasetId, documentIds: [...documentIds] });
    return { code: 0 };
  }
}

export interface RecordedLine {
  level: keyof Log;
  message: string;
}

export function recordingLog(): Log & { lines: RecordedLine[] } {
  const lines: RecordedLine[] = [];
  return {
    lines,
    info: (message) => lines.push({ level: "info", message }),
    success: (message) => lines.push({ level: "success", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message }),
  };
}

/** Create a temp folder holding the given files (name → content). */
export function makeDocDir(files: Record<string, string>, subdirs: string[] = []): string {
  const dir = mkdtempSync(join(tmpdir(), "ragflow-upload-test-"));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), content, "utf-8");
  }
  for (const sub of subdirs) {
    mkdirSync(join(dir, sub));
  }
  return dir;
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export interface Reply {
  status?: number;
  data: unknown;
}

/** In-process stand-in for the server: answers each request with the next scripted reply. */
export function scripted(...replies: Reply[]) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = replies.shift() ?? { status: 500, data: { message: "no scripted reply" } };
    return { data: reply.data, status: reply.status ?? 200, statusText: "", headers: {}, config };
  };
  return { adapter, requests };
}
