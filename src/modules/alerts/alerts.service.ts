import { Injectable, Logger } from '@nestjs/common';
import { DbSession, contextFor } from '../../database/db-session';
import { ServiceResult, notFound, ok } from '../../common/service-result';
import { CreateAlertDto } from './dto/create-alert.dto';
import { UpdateAlertDto } from './dto/update-alert.dto';
import { Alert } from './entities/alert.entity';

const missing = (id: number) => notFound(`Alert with ID ${id} not found`);

@Injectable()
export class AlertsService {
  private readonly logger = new Logger(AlertsService.name);
  private readonly context = contextFor(AlertsService.name);

  create(session: DbSession, dto: CreateAlertDto): Promise<ServiceResult<Alert>> {
    return session.unitOfWork(
      this.context('creating alert', `user ${dto.userId}`, { invalid: 'Invalid alert data. Check userId exists.' }),
      async (manager) => {
        const saved = await manager.save(
          manager.create(Alert, {
            userId: dto.userId,
            message: dto.message,
            type: dto.type,
            triggerDate: dto.triggerDate,
            isRead: dto.isRead ?? false,
          }),
        );
        this.logger.log(`Created ${dto.type} alert ${saved.id} for user ${dto.userId}`);
        return ok(await manager.findOneByOrFail(Alert, { id: saved.id }));
      },
    );
  }

  findOne(session: DbSession, id: number): Promise<ServiceResult<Alert>> {
    return session.read(this.context('fetching alert', id), async (manager) => {
      const alert = await manager.findOneBy(Alert, { id });
      return alert ? ok(alert) : missing(id);
    });
  }

  findByUser(session: DbSession, userId: number, unreadOnly = false): Promise<ServiceResult<Alert[]>> {
    return session.read(this.context('listing alerts for user', userId), async (manager) =>
      ok(
        await manager.find(Alert, {
          where: unreadOnly ? { userId, isRead: false } : { userId },
          order: { triggerDate: 'ASC', id: 'ASC' },
        }),
      ),
    );
  }

  markRead(session: DbSession, id: number): Promise<ServiceResult<Alert>> {
    return this.update(session, id, { isRead: true });
  }

  update(session: DbSession, id: number, dto: UpdateAlertDto): Promise<ServiceResult<Alert>> {
    return session.unitOfWork(this.context('updating alert', id), async (manager) => {
      const alert = await manager.findOneBy(Alert, { id });
      if (!alert) return missing(id);

      if (dto.message !== undefined) alert.message = dto.message;
      if (dto.type !== undefined) alert.type = dto.type;
      if (dto.triggerDate !== undefined) alert.triggerDate = dto.triggerDate;
      if (dto.isRead !== undefined) alert.isRead = dto.isRead;
      await manager.save(alert);
      return ok(await manager.findOneByOrFail(Alert, { id }));
    });
  }

  remove(session: DbSession, id: number): Promise<ServiceResult<void>> {
    return session.unitOfWork(this.context('deleting alert', id), async (manager) => {
      if (!(await manager.existsBy(Alert, { id }))) return missing(id);

      await manager.delete(Alert, { id });
      this.logger.log(`Deleted alert ${id}`);
      return ok(undefined);
    });
  }
}
