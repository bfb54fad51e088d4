import { RagflowClient, type RagflowClientOptions } from "../client/ragflow.js";
import { errorMessage } from "../client/errors.js";
import { loadConfig } from "../core/config.js";
import { uploadAndParse, type UploadSummary } from "../core/batch-upload.js";
import { consoleLog } from "../core/log.js";

const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

function plural(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? "s" : ""}`;
}

/** One-line result shown after the per-file progress */
export function formatSummary(summary: UploadSummary): string {
  const parts: string[] = [
    `Uploaded ${summary.uploaded.length} of ${plural(summary.selected.length, "file")} to ${summary.dataset.name}.`,
  ];
  if (summary.parsedIds.length > 0) {
    parts.push(`Parsing started for ${plural(summary.parsedIds.length, "document")}.`);
  } else {
    parts.push("Parsing not started.");
  }
  if (summary.failed.length > 0) parts.push(`(${summary.failed.length} failed)`);
  if (summary.skipped.length > 0) parts.push(`(${summary.skipped.length} unsupported skipped)`);
  return parts.join(" ");
}

export async function upload(
  datasetName: string,
  docDir: string,
  env: NodeJS.ProcessEnv,
  clientOptions: RagflowClientOptions = {}
): Promise<void> {
  let summary: UploadSummary;
  try {
    const config = loadConfig(env);
    const client = new RagflowClient(config, clientOptions);
    summary = await uploadAndParse(client, datasetName, docDir, consoleLog);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }

  console.log(`${BOLD}${formatSummary(summary)}${RESET}`);
  if (summary.failed.length > 0) {
    process.exit(1);
  }
}
