import { z } from "zod";

/**
 * Response shapes for the parts of the RAGFlow HTTP API this tool touches.
 * Only `id` and `name` are relied on; everything else is optional because
 * server versions differ in what they return.
 */

export const envelopeSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

export const datasetSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    avatar: z.string().nullish(),
    description: z.string().nullish(),
    embedding_model: z.string().optional(),
    chunk_method: z.string().optional(),
    permission: z.string().optional(),
    chunk_count: z.number().optional(),
    document_count: z.number().optional(),
    token_num: z.number().optional(),
    status: z.string().optional(),
    create_date: z.string().optional(),
    update_date: z.string().optional(),
  })
  .passthrough();

export type Dataset = z.infer<typeof datasetSchema>;

export const documentSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    dataset_id: z.string().optional(),
    location: z.string().optional(),
    size: z.number().optional(),
    type: z.string().optional(),
    chunk_method: z.string().optional(),
    run: z.string().optional(),
    created_by: z.string().optional(),
  })
  .passthrough();

export type RagflowDocument = z.infer<typeof documentSchema>;

export interface ListDatasetsQuery {
  name?: string;
  id?: string;
  page?: number;
  pageSize?: number;
  orderby?: "create_time" | "update_time";
  desc?: boolean;
}
