import { z } from 'zod';

export const pageSchema = z.object({
  sourceId: z.string().refine(s => s.trim().length > 0, 'Page sourceId cannot be empty'),
  pageNumber: z.number().int().min(1, 'Page numbers start at 1'),
  rawText: z.string(),
});

export const chunkRecordSchema = z.object({
  text: z.string(),
  sourceId: z.string().min(1),
  pageNumber: z.number().int().min(1),
  chunkIndex: z.number().int().min(0),
  chunkId: z.string().min(1),
  region: z.string().min(1),
  category: z.string().min(1),
});

export const metadataTableSchema = z.array(chunkRecordSchema);

/** metadata.json: the table plus the build id stamped into the matching index file. */
export const storedMetadataSchema = z.object({
  buildId: z.string().min(1),
  chunks: metadataTableSchema,
});

const retrievalFilterFields = {
  region: z.string().trim().min(1).optional(),
  category: z.string().trim().min(1).optional(),
};

export const searchQuerySchema = z.object({
  query: z.string().trim().min(1, 'Query cannot be empty'),
  k: z.number().int().min(1).max(100).default(5),
  ...retrievalFilterFields,
});

export const askQuestionSchema = z.object({
  question: z.string().trim().min(1, 'Question cannot be empty'),
  k: z.number().int().min(1).max(20).default(5),
  ...retrievalFilterFields,
});

export type PageInput = z.infer<typeof pageSchema>;
export type ChunkRecord = z.infer<typeof chunkRecordSchema>;
export type StoredMetadata = z.infer<typeof storedMetadataSchema>;
export type SearchQueryRequest = z.input<typeof searchQuerySchema>;
export type AskQuestionRequest = z.input<typeof askQuestionSchema>;
