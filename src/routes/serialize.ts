// Wire shapes shared by the storage routes.

import { z } from 'zod';

import type { StorageObject } from '../storage/types.js';

export const ObjectResponseSchema = z.object({
  path: z.string(),
  type: z.enum(['file', 'directory', 'symlink', 'unknown']),
  size: z.number().int().nonnegative(),
});

export type ObjectResponse = z.infer<typeof ObjectResponseSchema>;

/** Wildcard route parameter holding the object path. */
export const PathParamsSchema = z.object({
  '*': z.string().describe('Object path, "/"-separated'),
});

/** Backend internals stay on the server. */
export function serializeObject(object: StorageObject): ObjectResponse {
  return {
    path: object.path.toString(),
    type: object.type,
    size: object.size,
  };
}

/**
 * One JSON document per line. The first item is pulled before this is
 * called so that failures to start a listing still produce an error status.
 */
export async function* ndjson(
  first: StorageObject,
  rest: AsyncIterator<StorageObject>
): AsyncGenerator<string, void, undefined> {
  try {
    yield `${JSON.stringify(serializeObject(first))}\n`;
    while (true) {
      const next = await rest.next();
      if (next.done) {
        return;
      }
      yield `${JSON.stringify(serializeObject(next.value))}\n`;
    }
  } finally {
    // Closes the listing when the client disconnects early.
    await rest.return?.();
  }
}
