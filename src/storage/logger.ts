// Logger type shared by the storage library and the gateway.
//
// The library logs through the same pino instance Fastify uses when it runs
// inside the gateway; standalone callers get a silent logger unless they
// pass their own.

import type { FastifyBaseLogger } from 'fastify';
import { pino } from 'pino';

export type StorageLogger = FastifyBaseLogger;

export function silentLogger(): StorageLogger {
  return pino({ level: 'silent' });
}
