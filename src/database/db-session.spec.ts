import { createTestDatabase, TestDatabase } from '../../test/support/test-database';
import { invalid, ok } from '../common/service-result';
import { Category } from '../modules/categories/entities/category.entity';
import { contextFor } from './db-session';

describe('DbSession', () => {
  const context = contextFor('DbSessionSpec');
  let database: TestDatabase;

  beforeEach(async () => {
    database = await createTestDatabase();
  });

  afterEach(async () => {
    await database.close();
  });

  const count = () => database.dataSource.getRepository(Category).count();

  it('commits an ok unit of work', async () => {
    await database.run((s) =>
      s.unitOfWork(context('creating category'), async (manager) =>
        ok(await manager.save(manager.create(Category, { name: 'Kept', description: null }))),
      ),
    );

    expect(await count()).toBe(1);
  });

  it('rolls back when the work returns a failure', async () => {
    const result = await database.run((s) =>
      s.unitOfWork(context('creating category'), async (manager) => {
        await manager.save(manager.create(Category, { name: 'Discarded', description: null }));
        return invalid('changed my mind');
      }),
    );

    expect(result).toEqual({ kind: 'invalid', reason: 'changed my mind' });
    expect(await count()).toBe(0);
  });

  it('rolls back and hides the cause when the work throws', async () => {
    const result = await database.run((s) =>
      s.unitOfWork(context('creating category', 'Boom', { internal: 'Error creating category' }), async (manager) => {
        await manager.save(manager.create(Category, { name: 'Boom', description: null }));
        throw new Error('driver exploded');
      }),
    );

    expect(result).toEqual({ kind: 'internal', message: 'Error creating category' });
    expect(await count()).toBe(0);
  });

  it('uses the default conflict message when none is given', async () => {
    const insert = () =>
      database.run((s) =>
        s.unitOfWork(context('creating category'), async (manager) =>
          ok(await manager.save(manager.create(Category, { name: 'Twice', description: null }))),
        ),
      );
    await insert();

    expect(await insert()).toEqual({
      kind: 'conflict',
      field: 'name',
      message: 'A record with this name already exists',
    });
  });
});
