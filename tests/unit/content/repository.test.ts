import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ContentRepository, parseSort } from '@/content/repository.js';
import { StorageAdapter } from '@/storage/adapter.js';
import { FsBackend } from '@/storage/fs-backend.js';

import { createMockLogger } from '../../helpers/logger.js';

const SEQUENCE_FIELDS = ['visa_types', 'fees'];

describe('ContentRepository', () => {
  let testDir: string;
  let storage: StorageAdapter;
  let content: ContentRepository;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'content-store-repo-test-'));
    storage = new StorageAdapter({
      backend: new FsBackend({ dataDir: testDir, logger: createMockLogger() }),
      logger: createMockLogger(),
      collections: { countries: { sequenceFields: SEQUENCE_FIELDS } },
    });
    await storage.open();
    content = new ContentRepository({
      storage,
      collection: 'countries',
      sequenceFields: SEQUENCE_FIELDS,
      childKeys: ['country_id'],
    });
  });

  afterEach(async () => {
    await storage.close();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should parse ascending and descending sort keys', () => {
    expect(parseSort('name')).toEqual(['name', 1]);
    expect(parseSort('-name')).toEqual(['name', -1]);
  });

  describe('create()', () => {
    it('should fill defaults and return the normalized document', async () => {
      const created = await content.create({ id: 'chile', name: 'Chile', fees: [{ amount: 30 }] });

      expect(created).toEqual({
        id: 'chile',
        name: 'Chile',
        published: false,
        featured: false,
        visa_types: [],
        fees: [{ amount: 30 }],
      });
      expect(await content.getById('chile')).toEqual(created);
    });

    it('should use the generated id when no slug is given', async () => {
      const created = await content.create({ name: 'Peru' });

      expect(created.id).toEqual(expect.any(String));
      expect(await content.getById(String(created.id))).toMatchObject({ name: 'Peru' });
    });
  });

  describe('list()', () => {
    beforeEach(async () => {
      await content.create({ id: 'japan', name: 'Japan', region: 'Asia', published: true });
      await content.create({ id: 'france', name: 'France', region: 'Europe', published: true });
      await content.create({ id: 'korea', name: 'Korea', region: 'Asia', published: false });
    });

    it('should filter by published flag and region', async () => {
      const rows = await content.list({ published: true, region: 'Asia' });
      expect(rows.map((r) => r.id)).toEqual(['japan']);
    });

    it('should sort descending with a leading dash and paginate', async () => {
      const rows = await content.list({ sort: '-name', skip: 1, limit: 1 });
      expect(rows.map((r) => r.id)).toEqual(['japan']);
    });

    it('should search names and summaries', async () => {
      const rows = await content.list({ search: 'KOR' });
      expect(rows.map((r) => r.id)).toEqual(['korea']);
    });
  });

  describe('update()', () => {
    beforeEach(async () => {
      await content.create({ id: 'chile', name: 'Chile', summary: 'Long and thin' });
    });

    it('should set the given fields and ignore null values', async () => {
      const updated = await content.update('chile', { name: 'Chile!', summary: null });
      expect(updated).toMatchObject({ name: 'Chile!', summary: 'Long and thin' });
    });

    it('should return the current document for an empty update', async () => {
      expect(await content.update('chile', { summary: undefined })).toMatchObject({ name: 'Chile' });
    });

    it('should return null for an unknown id', async () => {
      expect(await content.update('atlantis', { name: 'Atlantis' })).toBeNull();
    });
  });

  it('should remove documents and report whether one was deleted', async () => {
    await content.create({ id: 'chile', name: 'Chile' });

    expect(await content.remove('chile')).toBe(true);
    expect(await content.remove('chile')).toBe(false);
    expect(await content.getById('chile')).toBeNull();
  });

  it('should rank search results by relevance', async () => {
    await content.create({ id: 'oslo', name: 'Oslo', summary: 'In Norway' });
    await content.create({ id: 'norway', name: 'Norway', summary: 'Fjords' });

    const rows = await content.search('norway');
    expect(rows.map((r) => r.id)).toEqual(['norway', 'oslo']);
  });

  describe('replaceEmbedded()', () => {
    it('should strip child ids and parent references at every level', async () => {
      await content.create({ id: 'chile', name: 'Chile' });

      const replaced = await content.replaceEmbedded('chile', 'visa_types', [
        {
          id: 'vt-1',
          country_id: 'chile',
          name: 'Tourist',
          fees: [{ id: 'fee-1', country_id: 'chile', amount: 50 }],
        },
      ]);

      expect(replaced).toBe(true);
      const stored = await content.getById('chile');
      expect(stored?.visa_types).toEqual([{ name: 'Tourist', fees: [{ amount: 50 }] }]);
    });

    it('should report false for an unknown document', async () => {
      expect(await content.replaceEmbedded('atlantis', 'fees', [])).toBe(false);
    });
  });
});
