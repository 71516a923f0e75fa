import createError from '@fastify/error';

// Storage errors (STORAGE_*)

/** Operation invoked before open() or after close() (503) */
export const StorageNotConnectedError = createError(
  'STORAGE_NOT_CONNECTED',
  'Storage backend is not connected',
  503
);

/** Filter, update or pipeline stage outside the supported grammar (400) */
export const StorageUnsupportedQueryError = createError<[string]>(
  'STORAGE_UNSUPPORTED_QUERY',
  'Unsupported query: %s',
  400
);

/** Collection file could not be read, parsed or written (500) */
export const StorageIoFailureError = createError<[string]>(
  'STORAGE_IO_FAILURE',
  'Storage I/O failure: %s',
  500
);

/** Network backend unreachable during the startup probe (503) */
export const StorageBackendUnavailableError = createError<[string]>(
  'STORAGE_BACKEND_UNAVAILABLE',
  'Storage backend unavailable: %s',
  503
);
