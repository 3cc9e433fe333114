// B2Client -- HTTP wrapper for the B2 native API.
//
// Uses native fetch (Node 20+) with an AbortController timeout and Zod
// validation of every response. One account session is cached and shared;
// calls that find it expired re-authorize and retry.

import type { z } from 'zod';

import { storageErrorKind, StorageInvalidDataError, StorageInvalidSettingsError } from '../../errors.js';
import { silentLogger } from '../../logger.js';
import type { StorageLogger } from '../../logger.js';
import { ObjectPath } from '../../object-path.js';
import { Limited } from '../../stream/limited.js';
import type { InUse } from '../../stream/limited.js';
import type { DataStream } from '../../types.js';

import { classifyApiError, classifyTransportError } from './errors.js';
import {
  AuthorizeAccountResponseSchema,
  B2_API_HOST,
  B2_API_VERSION,
  GetFileInfoResponseSchema,
  ListBucketsResponseSchema,
  ListFileNamesResponseSchema,
} from './schemas.js';
import type {
  AuthorizeAccountResponse,
  BucketInfo,
  FileInfo,
  GetFileInfoRequest,
  ListBucketsRequest,
  ListFileNamesRequest,
} from './schemas.js';

export const DEFAULT_MAX_CONNECTIONS = 4;
export const DEFAULT_AUTH_RETRIES = 3;
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface B2ClientOptions {
  keyId: string;
  key: string;
  /** API host (default: https://api.backblazeb2.com) */
  host?: string;
  /** Concurrent requests, downloads included (default: 4) */
  maxConnections?: number;
  /** Attempts per call when the session has expired (default: 3) */
  authRetries?: number;
  /** Time to wait for a response in milliseconds (default: 30000) */
  timeout?: number;
  logger?: StorageLogger;
}

interface Connection {
  timeout: number;
}

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function parseBody<T>(method: string, text: string, schema: Schema<T>): T {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new StorageInvalidDataError(`Unable to parse response from ${method}`, { cause: error });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new StorageInvalidDataError(`Unexpected response from ${method}: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export class B2Client {
  private readonly keyId: string;
  private readonly key: string;
  private readonly host: string;
  private readonly authRetries: number;
  private readonly connections: Limited<Connection>;
  private readonly log: StorageLogger;

  private pendingSession: Promise<AuthorizeAccountResponse> | undefined;
  private currentSession: AuthorizeAccountResponse | undefined;

  constructor(options: B2ClientOptions) {
    const authRetries = options.authRetries ?? DEFAULT_AUTH_RETRIES;
    if (!Number.isInteger(authRetries) || authRetries < 1) {
      throw new StorageInvalidSettingsError(`authRetries must be at least 1, got ${authRetries}`);
    }
    const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    if (timeout <= 0) {
      throw new StorageInvalidSettingsError(`timeout must be positive, got ${timeout}`);
    }

    this.keyId = options.keyId;
    this.key = options.key;
    // Strip trailing slash for consistent URL building
    this.host = (options.host ?? B2_API_HOST).replace(/\/+$/, '');
    this.authRetries = authRetries;
    this.connections = new Limited<Connection>(
      { timeout },
      options.maxConnections ?? DEFAULT_MAX_CONNECTIONS
    );
    this.log = options.logger ?? silentLogger();
  }

  // ---- Session ----

  /**
   * The cached account session, authorizing first if there is none.
   * Concurrent callers share one handshake; a failed handshake is not cached.
   */
  session(): Promise<AuthorizeAccountResponse> {
    if (this.pendingSession) {
      return this.pendingSession;
    }

    const pending = this.authorizeAccount();
    this.pendingSession = pending;
    return this.settleSession(pending);
  }

  /** Cache the outcome of `pending` unless a reset has replaced it meanwhile. */
  private async settleSession(
    pending: Promise<AuthorizeAccountResponse>
  ): Promise<AuthorizeAccountResponse> {
    try {
      const session = await pending;
      if (this.pendingSession === pending) {
        this.currentSession = session;
      }
      return session;
    } catch (error) {
      if (this.pendingSession === pending) {
        this.pendingSession = undefined;
      }
      throw error;
    }
  }

  /**
   * Drop the cached session, but only if it is still the one that issued
   * `token`; another caller may already have replaced it.
   */
  resetSession(token: string): void {
    if (this.currentSession?.authorizationToken === token) {
      this.currentSession = undefined;
      this.pendingSession = undefined;
    }
  }

  async accountId(): Promise<string> {
    const session = await this.session();
    return session.accountId;
  }

  // ---- API methods ----

  /**
   * POST /b2api/v2/b2_list_buckets
   */
  async listBuckets(
    request: Omit<ListBucketsRequest, 'accountId'>,
    path: ObjectPath = ObjectPath.empty()
  ): Promise<BucketInfo[]> {
    const accountId = await this.accountId();
    const response = await this.apiCall(
      'b2_list_buckets',
      path,
      { ...request, accountId },
      ListBucketsResponseSchema
    );
    return response.buckets;
  }

  /**
   * POST /b2api/v2/b2_list_file_names, following `nextFileName` until the
   * listing is exhausted. Pages are fetched as the consumer pulls.
   */
  async *listFileNames(
    request: ListFileNamesRequest,
    path: ObjectPath = ObjectPath.empty()
  ): AsyncGenerator<FileInfo, void, undefined> {
    let startFileName = request.startFileName;
    do {
      const page = await this.apiCall(
        'b2_list_file_names',
        path,
        { ...request, startFileName },
        ListFileNamesResponseSchema
      );
      yield* page.files;
      startFileName = page.nextFileName ?? undefined;
    } while (startFileName !== undefined);
  }

  /**
   * POST /b2api/v2/b2_get_file_info
   */
  async getFileInfo(fileId: string, path: ObjectPath = ObjectPath.empty()): Promise<FileInfo> {
    const request: GetFileInfoRequest = { fileId };
    return this.apiCall('b2_get_file_info', path, request, GetFileInfoResponseSchema);
  }

  /**
   * GET {downloadUrl}/file/{bucketName}/{fileName}
   */
  async downloadFileByName(bucketName: string, fileName: string, path: ObjectPath): Promise<DataStream> {
    const encoded = fileName.split('/').map(encodeURIComponent).join('/');
    return this.withSession('b2_download_file_by_name', (session) =>
      this.download(
        'b2_download_file_by_name',
        path,
        `${session.downloadUrl}/file/${encodeURIComponent(bucketName)}/${encoded}`,
        session.authorizationToken
      )
    );
  }

  /**
   * GET {downloadUrl}/b2api/v2/b2_download_file_by_id?fileId=
   */
  async downloadFileById(fileId: string, path: ObjectPath): Promise<DataStream> {
    return this.withSession('b2_download_file_by_id', (session) =>
      this.download(
        'b2_download_file_by_id',
        path,
        `${this.apiUrl(session.downloadUrl, 'b2_download_file_by_id')}?fileId=${encodeURIComponent(fileId)}`,
        session.authorizationToken
      )
    );
  }

  /**
   * Make an authorized API call, re-authorizing when the session has
   * expired. Gives up after `authRetries` attempts.
   */
  async apiCall<T>(method: string, path: ObjectPath, body: unknown, schema: Schema<T>): Promise<T> {
    return this.withSession(method, (session) =>
      this.request(
        method,
        path,
        this.apiUrl(session.apiUrl, method),
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: session.authorizationToken,
          },
          body: JSON.stringify(body),
        },
        schema
      )
    );
  }

  // ---- Private helpers ----

  private apiUrl(host: string, method: string): string {
    return `${host}/b2api/${B2_API_VERSION}/${method}`;
  }

  private async authorizeAccount(): Promise<AuthorizeAccountResponse> {
    const secret = Buffer.from(`${this.keyId}:${this.key}`).toString('base64');
    const session = await this.request(
      'b2_authorize_account',
      ObjectPath.empty(),
      this.apiUrl(this.host, 'b2_authorize_account'),
      {
        method: 'GET',
        headers: { Authorization: `Basic ${secret}` },
      },
      AuthorizeAccountResponseSchema
    );
    this.log.debug({ apiUrl: session.apiUrl }, 'B2 account authorized');
    return session;
  }

  private async withSession<T>(
    method: string,
    call: (session: AuthorizeAccountResponse) => Promise<T>
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const session = await this.session();
      try {
        return await call(session);
      } catch (error) {
        if (storageErrorKind(error) !== 'AccessExpired') {
          throw error;
        }
        this.resetSession(session.authorizationToken);
        if (attempt >= this.authRetries) {
          throw error;
        }
        this.log.warn({ method, attempt }, 'B2 session expired, re-authorizing');
      }
    }
  }

  private async request<T>(
    method: string,
    path: ObjectPath,
    url: string,
    init: RequestInit,
    schema: Schema<T>
  ): Promise<T> {
    return this.connections.use(async (connection) => {
      const controller = new AbortController();
      let timedOut = false;
      const timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, connection.timeout);

      try {
        let response: Response;
        let text: string;
        try {
          response = await fetch(url, { ...init, signal: controller.signal });
          text = await response.text();
        } catch (error) {
          throw classifyTransportError(error, method, timedOut);
        }

        if (!response.ok) {
          throw classifyApiError(method, path, text);
        }
        return parseBody(method, text, schema);
      } finally {
        clearTimeout(timeoutId);
      }
    });
  }

  /**
   * Start a download. The permit taken here is held until the returned
   * stream ends or is closed; the timeout only covers the response headers.
   */
  private async download(method: string, path: ObjectPath, url: string, token: string): Promise<DataStream> {
    const guard = await this.connections.take();
    try {
      const controller = new AbortController();
      let timedOut = false;
      const timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, guard.value.timeout);

      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers: { Authorization: token },
          signal: controller.signal,
        });
        if (!response.ok) {
          throw classifyApiError(method, path, await response.text());
        }
      } catch (error) {
        throw storageErrorKind(error) === undefined
          ? classifyTransportError(error, method, timedOut)
          : error;
      } finally {
        clearTimeout(timeoutId);
      }

      const body = response.body;
      if (!body) {
        guard.release();
        return emptyStream();
      }
      return new DownloadStream(body, guard, method, this.log);
    } catch (error) {
      guard.release();
      throw error;
    }
  }
}

type ResponseBody = NonNullable<Response['body']>;

/**
 * Body of a download. Holds its connection permit until the body has been
 * read to the end or the stream is closed, whether or not it was started.
 */
class DownloadStream implements AsyncIterableIterator<Buffer> {
  private readonly body: ResponseBody;
  private readonly guard: InUse<Connection>;
  private readonly method: string;
  private readonly log: StorageLogger;
  private readonly chunks: AsyncGenerator<Buffer, void, undefined>;
  private started = false;

  constructor(body: ResponseBody, guard: InUse<Connection>, method: string, log: StorageLogger) {
    this.body = body;
    this.guard = guard;
    this.method = method;
    this.log = log;
    this.chunks = this.read();
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  next(): Promise<IteratorResult<Buffer, void>> {
    this.started = true;
    return this.chunks.next();
  }

  async return(): Promise<IteratorResult<Buffer, void>> {
    if (this.started) {
      return this.chunks.return(undefined);
    }
    // Never pulled: the generator's cleanup will not run, so do it here.
    this.started = true;
    await this.chunks.return(undefined);
    await this.body.cancel().catch((error: unknown) => {
      this.log.debug({ method: this.method, err: error }, 'Failed to cancel B2 download');
    });
    this.guard.release();
    return { done: true, value: undefined };
  }

  private async *read(): AsyncGenerator<Buffer, void, undefined> {
    const reader = this.body.getReader();
    let finished = false;
    try {
      while (true) {
        let chunk: Uint8Array | undefined;
        try {
          const next = await reader.read();
          chunk = next.done ? undefined : next.value;
        } catch (error) {
          finished = true;
          throw classifyTransportError(error, this.method, false);
        }

        if (chunk === undefined) {
          finished = true;
          return;
        }
        yield Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
      }
    } finally {
      if (!finished) {
        // Consumer stopped early: abandon the rest of the body.
        await reader.cancel().catch((error: unknown) => {
          this.log.debug({ method: this.method, err: error }, 'Failed to cancel B2 download');
        });
      }
      reader.releaseLock();
      this.guard.release();
    }
  }
}

async function* emptyStream(): AsyncGenerator<Buffer, void, undefined> {
  // No body: nothing to yield.
}
