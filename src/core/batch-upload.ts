import { basename } from "node:path";
import type { Dataset, Envelope, ListDatasetsQuery, RagflowDocument } from "../client/models.js";
import { AuthenticationError, ResourceNotFoundError, errorMessage } from "../client/errors.js";
import { scanDirectory } from "./files.js";
import type { Log } from "./log.js";

/** The three remote operations a batch upload needs. `RagflowClient` is the real one. */
export interface DocumentService {
  listDatasets(query: ListDatasetsQuery): Promise<Dataset[]>;
  uploadDocuments(datasetId: string, filePaths: string[]): Promise<RagflowDocument[]>;
  parseDocuments(datasetId: string, documentIds: string[]): Promise<Envelope>;
}

export interface UploadedFile {
  file: string;
  document: RagflowDocument;
}

export interface FailedFile {
  file: string;
  reason: string;
}

export interface UploadSummary {
  dataset: Dataset;
  selected: string[];
  skipped: string[];
  uploaded: UploadedFile[];
  failed: FailedFile[];
  /** Ids handed to the parse call, in upload order. Empty when parse was not called. */
  parsedIds: string[];
}

/** Look a dataset up by name. Anything other than exactly one match is an error. */
export async function resolveDataset(service: DocumentService, name: string): Promise<Dataset> {
  const matches = await service.listDatasets({ name });
  if (matches.length === 0) {
    throw new ResourceNotFoundError(`Dataset not found: ${name}`);
  }
  if (matches.length > 1) {
    throw new ResourceNotFoundError(
      `Dataset name is ambiguous: ${name} matches ${matches.length} datasets`
    );
  }
  return matches[0];
}

/**
 * Upload every supported file sitting directly in `docDir` to the dataset
 * called `datasetName`, then start parsing for the ones that made it.
 *
 * Files go up one at a time. A failed upload is recorded and the batch moves
 * on, except for authentication failures, which end the run. Parse is called
 * once, and only when at least one upload succeeded.
 */
export async function uploadAndParse(
  service: DocumentService,
  datasetName: string,
  docDir: string,
  log: Log
): Promise<UploadSummary> {
  log.info(`Looking up dataset: ${datasetName}`);
  const dataset = await resolveDataset(service, datasetName);
  log.info(`Found dataset ${dataset.name} (id ${dataset.id})`);

  const scan = scanDirectory(docDir);
  log.info(`Scanning: ${scan.dir}`);
  for (const file of scan.skipped) {
    log.warn(`  ⏭️  Skipping unsupported file type: ${basename(file)}`);
  }

  const summary: UploadSummary = {
    dataset,
    selected: scan.supported,
    skipped: scan.skipped,
    uploaded: [],
    failed: [],
    parsedIds: [],
  };

  if (scan.supported.length === 0) {
    log.info("No supported files to upload");
    return summary;
  }

  log.info(`Uploading: ${scan.supported.length} file${scan.supported.length !== 1 ? "s" : ""}`);

  for (const file of scan.supported) {
    const name = basename(file);
    try {
      const docs = await service.uploadDocuments(dataset.id, [file]);
      if (docs.length === 0) {
        summary.failed.push({ file, reason: "Upload returned no document" });
        log.error(`  ❌ ${name} — upload returned no document`);
        continue;
      }
      summary.uploaded.push({ file, document: docs[0] });
      log.success(`  ✅ ${name.padEnd(30)} ${docs[0].id}`);
    } catch (err) {
      if (err instanceof AuthenticationError) throw err;
      const reason = errorMessage(err);
      summary.failed.push({ file, reason });
      log.error(`  ❌ ${name} — ${reason}`);
    }
  }

  if (summary.uploaded.length === 0) {
    log.info("Nothing uploaded, skipping parse");
    return summary;
  }

  const ids = summary.uploaded.map((u) => u.document.id);
  log.info(`Starting parse for ${ids.length} document${ids.length !== 1 ? "s" : ""}`);
  const reply = await service.parseDocuments(dataset.id, ids);
  summary.parsedIds = ids;
  log.success(`Parse request accepted${reply.message ? `: ${reply.message}` : ""}`);

  return summary;
}
