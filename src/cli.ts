import { Command } from "commander";
import { upload } from "./commands/upload.js";

export type UploadAction = (datasetName: string, docDir: string) => Promise<void>;

const defaultAction: UploadAction = (datasetName, docDir) => upload(datasetName, docDir, process.env);

export function createProgram(action: UploadAction = defaultAction): Command {
  const program = new Command();

  program
    .name("ragflow-upload")
    .description("Upload the supported documents in a folder to a RAGFlow dataset and start parsing them")
    .version("0.1.0")
    .argument("<dataset_name>", "Name of an existing dataset")
    .argument("<doc_dir>", "Folder whose .doc/.docx/.pdf/.xls/.xlsx/.md/.txt files are uploaded (not recursive)")
    .action(async (datasetName: string, docDir: string) => {
      await action(datasetName, docDir);
    });

  return program;
}
