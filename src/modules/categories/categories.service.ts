import { Injectable, Logger } from '@nestjs/common';
import { DbSession, contextFor } from '../../database/db-session';
import { ServiceResult, notFound, ok } from '../../common/service-result';
import { CreateCategoryDto } from './dto/create-category.dto';
import { UpdateCategoryDto } from './dto/update-category.dto';
import { Category } from './entities/category.entity';

const missing = (id: number) => notFound(`Category with ID ${id} not found`);

@Injectable()
export class CategoriesService {
  private readonly logger = new Logger(CategoriesService.name);
  private readonly context = contextFor(CategoriesService.name);

  create(session: DbSession, dto: CreateCategoryDto): Promise<ServiceResult<Category>> {
    return session.unitOfWork(
      this.context('creating category', dto.name, {
        conflict: () => `Category with name ${dto.name} already exists`,
      }),
      async (manager) => {
        const saved = await manager.save(
          manager.create(Category, { name: dto.name, description: dto.description ?? null }),
        );
        this.logger.log(`Created category ${saved.id}`);
        return ok(await manager.findOneByOrFail(Category, { id: saved.id }));
      },
    );
  }

  findAll(session: DbSession): Promise<ServiceResult<Category[]>> {
    return session.read(this.context('listing categories'), async (manager) =>
      ok(await manager.find(Category, { order: { name: 'ASC' } })),
    );
  }

  findOne(session: DbSession, id: number): Promise<ServiceResult<Category>> {
    return session.read(this.context('fetching category', id), async (manager) => {
      const category = await manager.findOneBy(Category, { id });
      return category ? ok(category) : missing(id);
    });
  }

  update(session: DbSession, id: number, dto: UpdateCategoryDto): Promise<ServiceResult<Category>> {
    return session.unitOfWork(
      this.context('updating category', id, {
        conflict: () => `Category with name ${dto.name} already exists`,
      }),
      async (manager) => {
        const category = await manager.findOneBy(Category, { id });
        if (!category) return missing(id);

        if (dto.name !== undefined) category.name = dto.name;
        if (dto.description !== undefined) category.description = dto.description;
        await manager.save(category);
        return ok(await manager.findOneByOrFail(Category, { id }));
      },
    );
  }

  remove(session: DbSession, id: number): Promise<ServiceResult<void>> {
    return session.unitOfWork(
      this.context('deleting category', id, {
        invalid: 'Category is still used by transactions, expenses, recurring transactions or budgets',
      }),
      async (manager) => {
        const category = await manager.findOneBy(Category, { id });
        if (!category) return missing(id);

        await manager.delete(Category, { id });
        this.logger.log(`Deleted category ${id}`);
        return ok(undefined);
      },
    );
  }
}
