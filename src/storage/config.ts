import { z } from 'zod';

const IndexSchema = z.object({
  /** Index keys, e.g. { "region": 1 } or { "name": "text" } */
  keys: z.record(z.string(), z.union([z.literal(1), z.literal(-1), z.literal('text')])),
  unique: z.boolean().default(false),
});

/**
 * Storage configuration Zod schema.
 *
 * `backend: "auto"` probes MongoDB once at startup and falls back to the
 * file store; `"mongo"` makes MongoDB mandatory; `"file"` skips the probe.
 *
 * SECURITY: `mongo.url` may embed credentials and must never appear in logs.
 */
export const StorageConfigSchema = z
  .object({
    backend: z.enum(['auto', 'mongo', 'file']).default('auto'),

    file: z
      .object({
        /** Directory holding one <collection>.json file per collection */
        dataDir: z.string().min(1).default('./data/storage'),
      })
      .default(() => ({ dataDir: './data/storage' })),

    mongo: z
      .object({
        /** Connection string (sensitive - never log). Empty disables the probe. */
        url: z.string().default(''),
        database: z.string().min(1).default('content'),
        /** Small fixed pool */
        maxPoolSize: z.number().int().min(1).max(50).default(10),
        /** Bound on the startup connectivity probe */
        probeTimeoutMs: z.number().int().min(100).max(60000).default(10000),
        /** Indexes created at open, keyed by collection */
        indexes: z.record(z.string(), z.array(IndexSchema)).default(() => ({})),
      })
      .default(() => ({
        url: '',
        database: 'content',
        maxPoolSize: 10,
        probeTimeoutMs: 10000,
        indexes: {},
      })),

    text: z
      .object({
        /** Fields searched by the $text filter operator */
        fields: z.array(z.string().min(1)).min(1).default(['name', 'summary']),
        /** Relevance weights used by textSearch */
        weights: z
          .record(z.string(), z.number().positive())
          .default(() => ({ name: 10, summary: 5, region: 3 })),
      })
      .default(() => ({
        fields: ['name', 'summary'],
        weights: { name: 10, summary: 5, region: 3 },
      })),

    /** Per-collection normalization: nested sequences that must never be absent */
    collections: z
      .record(
        z.string(),
        z.object({
          sequenceFields: z.array(z.string().min(1)).default([]),
        })
      )
      .default(() => ({})),

    aggregation: z
      .object({
        /** Unimplemented stage kinds: pass rows through, or reject the pipeline */
        unknownStages: z.enum(['passthrough', 'reject']).default('passthrough'),
      })
      .default(() => ({ unknownStages: 'passthrough' as const })),
  })
  .superRefine((data, ctx) => {
    if (data.backend === 'mongo' && data.mongo.url === '') {
      ctx.addIssue({
        code: 'custom',
        message: 'mongo backend requires storage.mongo.url',
        path: ['mongo', 'url'],
      });
    }
  });

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export type IndexConfig = z.infer<typeof IndexSchema>;
