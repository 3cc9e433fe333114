// Request and response shapes of the B2 native API (v2).

import { z } from 'zod';

export const B2_API_VERSION = 'v2';
export const B2_API_HOST = 'https://api.backblazeb2.com';

// ---- Responses ----

export const AuthorizeAccountResponseSchema = z.object({
  accountId: z.string(),
  apiUrl: z.string(),
  authorizationToken: z.string(),
  downloadUrl: z.string(),
  recommendedPartSize: z.number().int().optional(),
});

export type AuthorizeAccountResponse = z.infer<typeof AuthorizeAccountResponseSchema>;

export const BucketInfoSchema = z.object({
  accountId: z.string(),
  bucketId: z.string(),
  bucketName: z.string(),
  bucketType: z.string(),
});

export type BucketInfo = z.infer<typeof BucketInfoSchema>;

export const ListBucketsResponseSchema = z.object({
  buckets: z.array(BucketInfoSchema),
});

/**
 * `upload` is a stored file version, `folder` a virtual directory reported
 * when listing with a delimiter.
 */
const FileActionSchema = z.enum(['start', 'upload', 'hide', 'folder']);

export const FileInfoSchema = z.object({
  fileId: z.string().nullable().optional(),
  fileName: z.string(),
  action: FileActionSchema,
  contentLength: z.number().int().nonnegative(),
  contentType: z.string().nullable().optional(),
  uploadTimestamp: z.number().int(),
});

export type FileInfo = z.infer<typeof FileInfoSchema>;

export const ListFileNamesResponseSchema = z.object({
  files: z.array(FileInfoSchema),
  nextFileName: z.string().nullable(),
});

export const GetFileInfoResponseSchema = FileInfoSchema;

/** Body of every non-2xx response. */
export const ErrorResponseSchema = z.object({
  status: z.number().int(),
  code: z.string(),
  message: z.string().default(''),
});

// ---- Requests ----

export interface ListBucketsRequest {
  accountId: string;
  bucketId?: string;
  bucketName?: string;
}

export interface ListFileNamesRequest {
  bucketId: string;
  startFileName?: string;
  maxFileCount?: number;
  prefix?: string;
  delimiter?: string;
}

export interface GetFileInfoRequest {
  fileId: string;
}
