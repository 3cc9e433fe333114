// GET /directories/* -- direct children of a directory.
//
// The trailing "/" is optional here; the root is GET /directories/.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';

import type { ObjectResponse } from './serialize.js';
import { ObjectResponseSchema, PathParamsSchema, serializeObject } from './serialize.js';

export function directoryPath(param: string): string {
  if (param === '' || param.endsWith('/')) {
    return param;
  }
  return `${param}/`;
}

const directoryRoutes: FastifyPluginCallback = (instance, _options, done) => {
  const fastify = instance.withTypeProvider<ZodTypeProvider>();

  fastify.get(
    '/directories/*',
    {
      schema: {
        description: 'List the direct children of a directory',
        tags: ['Storage'],
        params: PathParamsSchema,
        response: { 200: z.array(ObjectResponseSchema) },
      },
    },
    async (request) => {
      const entries: ObjectResponse[] = [];
      for await (const object of fastify.storage.listDirectory(directoryPath(request.params['*']))) {
        entries.push(serializeObject(object));
      }
      return entries;
    }
  );

  done();
};

export const directoryRoutesPlugin = fp(directoryRoutes, {
  name: 'directory-routes',
  fastify: '5.x',
});
