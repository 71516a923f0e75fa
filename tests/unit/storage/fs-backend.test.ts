import { writeFileSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { FsBackend } from '@/storage/fs-backend.js';

import { createMockLogger } from '../../helpers/logger.js';

describe('FsBackend', () => {
  let testDir: string;
  let backend: FsBackend;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'content-store-fs-test-'));
    backend = new FsBackend({ dataDir: testDir, logger: createMockLogger() });
    await backend.open();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('insertOne()', () => {
    it('should assign a native id and report the slug when one is given', async () => {
      const result = await backend.insertOne('countries', { id: 'chile', name: 'Chile' });
      expect(result).toEqual({ id: 'chile' });

      const [stored] = backend.readCollection('countries');
      expect(stored._id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should report the generated id when no slug is given', async () => {
      const { id } = await backend.insertOne('countries', { name: 'Chile' });
      const stored = await backend.findOne('countries', { _id: id });
      expect(stored).toEqual({ _id: id, name: 'Chile' });
    });

    it('should keep a caller-provided _id', async () => {
      const result = await backend.insertOne('countries', { _id: 'fixed-id', name: 'Chile' });
      expect(result).toEqual({ id: 'fixed-id' });
    });

    it('should not modify the caller document', async () => {
      const doc = { name: 'Chile' };
      await backend.insertOne('countries', doc);
      expect(doc).toEqual({ name: 'Chile' });
    });

    it('should store dates as ISO strings', async () => {
      await backend.insertOne('countries', {
        id: 'chile',
        lastUpdated: new Date('2024-03-01T00:00:00.000Z'),
      });
      expect(await backend.findOne('countries', { id: 'chile' })).toMatchObject({
        lastUpdated: '2024-03-01T00:00:00.000Z',
      });
    });

    it('should write a pretty-printed JSON array in insertion order', async () => {
      await backend.insertOne('countries', { _id: '1', name: 'A' });
      await backend.insertOne('countries', { _id: '2', name: 'B' });

      const content = await readFile(join(testDir, 'countries.json'), 'utf-8');
      expect(content).toBe(
        '[\n  {\n    "_id": "1",\n    "name": "A"\n  },\n  {\n    "_id": "2",\n    "name": "B"\n  }\n]\n'
      );
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await backend.insertOne('countries', { id: 'japan', name: 'Japan', region: 'Asia', tags: ['X'] });
      await backend.insertOne('countries', { id: 'france', name: 'France', region: 'Europe', tags: ['Y', 'X'] });
      await backend.insertOne('countries', { id: 'korea', name: 'Korea', region: 'Asia', tags: null });
    });

    it('should return null for a missing document', async () => {
      expect(await backend.findOne('countries', { id: 'atlantis' })).toBeNull();
      expect(await backend.findOne('empty', {})).toBeNull();
    });

    it('should return the first match in insertion order', async () => {
      expect(await backend.findOne('countries', { region: 'Asia' })).toMatchObject({ id: 'japan' });
    });

    it('should find with sort, skip and limit', async () => {
      const rows = await backend.find('countries', {}, { sort: ['name', 1], skip: 1, limit: 1 }).toList();
      expect(rows.map((r) => r.id)).toEqual(['japan']);
    });

    it('should see writes made after the cursor was created', async () => {
      const cursor = backend.find('countries', { region: 'Asia' });
      await backend.insertOne('countries', { id: 'china', name: 'China', region: 'Asia' });
      expect(await cursor.toList()).toHaveLength(3);
    });

    it('should count matching documents', async () => {
      expect(await backend.countDocuments('countries', {})).toBe(3);
      expect(await backend.countDocuments('countries', { region: 'Asia' })).toBe(2);
    });

    it('should return distinct values with arrays flattened and nulls excluded', async () => {
      expect(await backend.distinct('countries', 'tags', {})).toEqual(['X', 'Y']);
      expect(await backend.distinct('countries', 'region', {})).toEqual(['Asia', 'Europe']);
    });

    it('should aggregate a per-region count', async () => {
      const rows = await backend
        .aggregate('countries', [
          { $group: { _id: '$region', count: { $sum: 1 } } },
          { $sort: { count: -1 } },
        ])
        .toList();
      expect(rows).toEqual([
        { _id: 'Asia', count: 2 },
        { _id: 'Europe', count: 1 },
      ]);
    });

    it('should apply a cursor chain after the pipeline', async () => {
      const rows = await backend.aggregate('countries', [{ $match: { region: 'Asia' } }]).skip(1).toList();
      expect(rows.map((r) => r.id)).toEqual(['korea']);
    });

    it('should rank text search results', async () => {
      const rows = await backend.textSearch('countries', 'a', 0);
      expect(rows.map((r) => r.id)).toEqual(['japan', 'korea', 'france']);
    });

    it('should reject unsupported filters before reading', async () => {
      await expect(backend.findOne('countries', { name: { $ne: 'Japan' } })).rejects.toThrow(
        'Unsupported query: operator $ne on field name'
      );
      expect(() => backend.find('countries', { $or: [] })).toThrow(
        'Unsupported query: operator $or is not supported'
      );
    });
  });

  describe('date filters', () => {
    const publishedAt = new Date('2024-05-01T00:00:00.000Z');

    beforeEach(async () => {
      await backend.insertOne('notes', { id: 'a', publishedAt, tags: ['visa'] });
      await backend.insertOne('notes', { id: 'b', publishedAt: new Date('2024-06-01T00:00:00.000Z') });
    });

    it('should match a stored date with the same Date value', async () => {
      expect(await backend.findOne('notes', { publishedAt })).toMatchObject({ id: 'a' });
      expect(await backend.countDocuments('notes', { publishedAt })).toBe(1);
      expect(await backend.distinct('notes', 'tags', { publishedAt })).toEqual(['visa']);
    });

    it('should match a Date in find, aggregate $match and updates', async () => {
      const found = await backend.find('notes', { publishedAt }).toList();
      expect(found.map((r) => r.id)).toEqual(['a']);

      const rows = await backend.aggregate('notes', [{ $match: { publishedAt } }]).toList();
      expect(rows.map((r) => r.id)).toEqual(['a']);

      expect(await backend.updateOne('notes', { publishedAt }, { $set: { read: true } })).toEqual({
        matchedCount: 1,
        modifiedCount: 1,
      });
    });

    it('should delete by a Date value', async () => {
      expect(await backend.deleteMany('notes', { publishedAt })).toEqual({ deletedCount: 1 });
      expect(await backend.countDocuments('notes', {})).toBe(1);
    });
  });

  describe('updates', () => {
    beforeEach(async () => {
      await backend.insertOne('countries', { id: 'chile', name: 'Chile', fees: [1, 2], meta: { a: 1, b: 2 } });
    });

    it('should report matched and modified counts', async () => {
      expect(await backend.updateOne('countries', { id: 'chile' }, { $set: { name: 'Chile!' } })).toEqual({
        matchedCount: 1,
        modifiedCount: 1,
      });
      expect(await backend.updateOne('countries', { id: 'peru' }, { $set: { name: 'Peru' } })).toEqual({
        matchedCount: 0,
        modifiedCount: 0,
      });
    });

    it('should be idempotent', async () => {
      await backend.updateOne('countries', { id: 'chile' }, { $set: { name: 'Chile!' } });
      const first = backend.readCollection('countries');

      const second = await backend.updateOne('countries', { id: 'chile' }, { $set: { name: 'Chile!' } });

      expect(second).toEqual({ matchedCount: 1, modifiedCount: 0 });
      expect(backend.readCollection('countries')).toEqual(first);
    });

    it('should replace sequences and nested maps wholesale', async () => {
      await backend.updateOne('countries', { id: 'chile' }, { fees: [3], meta: { c: 3 } });
      expect(await backend.findOne('countries', { id: 'chile' })).toMatchObject({
        fees: [3],
        meta: { c: 3 },
      });
    });

    it('should return the document before or after the update', async () => {
      const before = await backend.findOneAndUpdate('countries', { id: 'chile' }, { name: 'A' }, 'before');
      const after = await backend.findOneAndUpdate('countries', { id: 'chile' }, { name: 'B' }, 'after');

      expect(before).toMatchObject({ name: 'Chile' });
      expect(after).toMatchObject({ name: 'B' });
      expect(await backend.findOneAndUpdate('countries', { id: 'peru' }, { name: 'C' }, 'after')).toBeNull();
    });

    it('should reject unsupported update operators', async () => {
      await expect(backend.updateOne('countries', { id: 'chile' }, { $push: { fees: 4 } })).rejects.toThrow(
        'Unsupported query: update operator $push is not supported'
      );
    });
  });

  describe('deletes', () => {
    beforeEach(async () => {
      await backend.insertOne('countries', { id: 'a', region: 'Asia' });
      await backend.insertOne('countries', { id: 'b', region: 'Asia' });
      await backend.insertOne('countries', { id: 'c', region: 'Europe' });
    });

    it('should delete the first match only', async () => {
      expect(await backend.deleteOne('countries', { region: 'Asia' })).toEqual({ deletedCount: 1 });
      expect((await backend.find('countries', {}).toList()).map((r) => r.id)).toEqual(['b', 'c']);
    });

    it('should report zero when nothing matches', async () => {
      expect(await backend.deleteOne('countries', { region: 'Africa' })).toEqual({ deletedCount: 0 });
    });

    it('should leave no matches after deleteMany', async () => {
      expect(await backend.deleteMany('countries', { region: 'Asia' })).toEqual({ deletedCount: 2 });
      expect(await backend.countDocuments('countries', { region: 'Asia' })).toBe(0);
    });

    it('should empty the collection with an empty filter', async () => {
      await backend.deleteMany('countries', {});
      expect(await backend.countDocuments('countries', {})).toBe(0);
    });
  });

  describe('failures', () => {
    it('should raise an I/O failure for an unparseable file', async () => {
      writeFileSync(join(testDir, 'broken.json'), '{ not json');
      await expect(backend.findOne('broken', {})).rejects.toMatchObject({
        code: 'STORAGE_IO_FAILURE',
        statusCode: 500,
      });
    });

    it('should raise an I/O failure when the file is not a document array', async () => {
      writeFileSync(join(testDir, 'scalar.json'), '[1, 2]');
      await expect(backend.countDocuments('scalar', {})).rejects.toThrow(
        'Storage I/O failure: scalar is not an array of documents'
      );
    });

    it('should reject collection names that leave the data directory', async () => {
      await expect(backend.insertOne('../escape', { a: 1 })).rejects.toThrow(
        'Unsupported query: invalid collection name "../escape"'
      );
    });

    it('should report healthy while the data directory is usable', async () => {
      expect(await backend.healthy()).toBe(true);
      await rm(testDir, { recursive: true, force: true });
      expect(await backend.healthy()).toBe(false);
    });
  });

  describe('concurrent writers', () => {
    it('should keep only the later snapshot when two writers overlap', async () => {
      const other = new FsBackend({ dataDir: testDir, logger: createMockLogger() });
      await backend.insertOne('countries', { id: 'chile', name: 'Chile' });

      const snapshotA = backend.readCollection('countries');
      const snapshotB = other.readCollection('countries');

      backend.writeCollection('countries', [...snapshotA, { _id: 'a', name: 'From A' }]);
      other.writeCollection('countries', [...snapshotB, { _id: 'b', name: 'From B' }]);

      const names = (await backend.find('countries', {}).toList()).map((r) => r.name);
      expect(names).toEqual(['Chile', 'From B']);
    });
  });

  it('should log when opened', async () => {
    const logger = createMockLogger();
    await new FsBackend({ dataDir: join(testDir, 'nested'), logger }).open();
    expect(vi.mocked(logger.info)).toHaveBeenCalledWith(
      { dataDir: join(testDir, 'nested') },
      'File storage opened'
    );
  });
});
