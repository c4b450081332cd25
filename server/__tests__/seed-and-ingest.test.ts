import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemStorage } from '../storage.memory';
import { parseSeedArgs, seedDatabase } from '../seed';
import { ingestRecords } from '../scripts/ingest-reviews';
import { ValidationError } from '../errors/app-errors';

const records = [
  { 'id': 'P1', 'categories': 'Tablets,Electronics', 'reviews.rating': 4, 'reviews.date': '2017-05-01', 'reviews.text': 'Solid' },
  { 'id': 'P2', 'categories': 'Tablets', 'reviews.rating': 2, 'reviews.date': '2017-05-02' },
  { 'id': 'P3', 'categories': 'Tablets', 'reviews.date': '2017-05-03' },
];

describe('ingestRecords', () => {
  let storage: MemStorage;

  beforeEach(() => {
    storage = new MemStorage();
  });

  it('reports without writing on a dry run', async () => {
    const summary = await ingestRecords(storage, records, { dryRun: true });

    expect(summary).toEqual({
      categories: ['Electronics', 'Tablets'],
      inputRecords: 3,
      droppedRecords: 1,
      rowsPrepared: 3,
      rowsInserted: 0,
    });
    expect(await storage.listCategoryNames()).toEqual([]);
  });

  it('writes categories and rows when executed', async () => {
    const summary = await ingestRecords(storage, records, { dryRun: false });

    expect(summary.rowsInserted).toBe(3);
    expect(await storage.listCategoryNames()).toEqual(['Electronics', 'Tablets']);
    expect(await storage.ratingHistogram(['Tablets'])).toEqual([
      { category: 'Tablets', rating: 4, count: 1 },
      { category: 'Tablets', rating: 2, count: 1 },
    ]);
  });
});

describe('seedDatabase', () => {
  let storage: MemStorage;

  beforeEach(async () => {
    storage = new MemStorage();
    await storage.upsertCategories(['Electronics', 'Tablets']);
  });

  it('creates the admin and grants analysts exactly their categories', async () => {
    const options = parseSeedArgs(
      ['--analyst', 'ana@example.com=Electronics|Tablets', '--verbose'],
      'admin@example.com'
    );

    const [admin, analyst] = await seedDatabase(storage, options);

    expect(admin).toMatchObject({ email: 'admin@example.com', role: 'admin' });
    expect(analyst).toMatchObject({ email: 'ana@example.com', role: 'analyst', accessVersion: 1 });
    expect(await storage.getGrantedCategoryNames(analyst.id)).toEqual(['Electronics', 'Tablets']);
  });

  it('is safe to re-run and replaces grants', async () => {
    await seedDatabase(storage, { adminEmail: 'admin@example.com', analysts: [{ email: 'ana@example.com', categories: ['Electronics', 'Tablets'] }] });
    const [admin, analyst] = await seedDatabase(storage, {
      adminEmail: 'admin@example.com',
      analysts: [{ email: 'ana@example.com', categories: ['Tablets'] }],
    });

    expect(admin.id).toBe(1);
    expect(analyst).toMatchObject({ id: 2, accessVersion: 2 });
    expect(await storage.getGrantedCategoryNames(analyst.id)).toEqual(['Tablets']);
  });

  it('refuses unknown categories', async () => {
    await expect(seedDatabase(storage, {
      adminEmail: 'admin@example.com',
      analysts: [{ email: 'ana@example.com', categories: ['Garden'] }],
    })).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects malformed analyst arguments', () => {
    expect(() => parseSeedArgs(['--analyst', 'no-categories'], 'admin@example.com')).toThrow(ValidationError);
  });
});
