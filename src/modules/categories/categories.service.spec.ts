import { createTestDatabase, TestDatabase } from '../../../test/support/test-database';
import { CategoriesService } from './categories.service';
import { Category } from './entities/category.entity';

describe('CategoriesService', () => {
  let database: TestDatabase;
  let service: CategoriesService;

  beforeEach(async () => {
    database = await createTestDatabase();
    service = new CategoriesService();
  });

  afterEach(async () => {
    await database.close();
  });

  it('creates a category without a description', async () => {
    const result = await database.run((s) => service.create(s, { name: 'Travel' }));

    expect(result.kind === 'ok' && result.value).toMatchObject({ name: 'Travel', description: null });
  });

  it('reports a duplicate name as a conflict', async () => {
    await database.run((s) => service.create(s, { name: 'Travel' }));

    const result = await database.run((s) => service.create(s, { name: 'Travel', description: 'again' }));

    expect(result).toEqual({ kind: 'conflict', field: 'name', message: 'Category with name Travel already exists' });
    expect(await database.dataSource.getRepository(Category).count()).toBe(1);
  });

  it('updates only the given fields', async () => {
    const created = await database.run((s) => service.create(s, { name: 'Travel', description: 'Trips' }));
    if (created.kind !== 'ok') throw new Error('category not created');

    const result = await database.run((s) => service.update(s, created.value.id, { description: 'Flights and hotels' }));

    expect(result.kind === 'ok' && result.value).toMatchObject({ name: 'Travel', description: 'Flights and hotels' });
  });

  it('lists categories by name', async () => {
    await database.run((s) => service.create(s, { name: 'Utilities' }));
    await database.run((s) => service.create(s, { name: 'Health' }));

    const result = await database.run((s) => service.findAll(s));

    expect(result.kind === 'ok' && result.value.map((c) => c.name)).toEqual(['Health', 'Utilities']);
  });

  it('returns not_found for a missing category', async () => {
    expect(await database.run((s) => service.findOne(s, 3))).toEqual({
      kind: 'not_found',
      message: 'Category with ID 3 not found',
    });
  });
});
