import { Injectable, Logger } from '@nestjs/common';
import type { EntityManager } from 'typeorm';
import { DbSession, contextFor } from '../../database/db-session';
import { ServiceResult, invalid, notFound, ok } from '../../common/service-result';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { UserProfile } from './entities/user-profile.entity';
import { User } from './entities/user.entity';
import { hashPassword, normalizeEmail } from './password';

export type UserView = Omit<User, 'password'>;

export function toUserView(user: User): UserView {
  const { password: _password, ...view } = user;
  return view;
}

function conflictMessage(field: string): string {
  if (field === 'email') return 'Email already registered';
  if (field === 'username') return 'Username already taken';
  return `A user with this ${field} already exists`;
}

const missing = (id: number) => notFound(`User with ID ${id} not found`);

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);
  private readonly context = contextFor(UsersService.name);

  private withProfile(manager: EntityManager, id: number): Promise<User | null> {
    return manager.findOne(User, { where: { id }, relations: { profile: true } });
  }

  /** Creates the user and its profile in one transaction. */
  create(session: DbSession, dto: CreateUserDto): Promise<ServiceResult<UserView>> {
    const email = normalizeEmail(dto.email);

    return session.unitOfWork(
      this.context('creating user', email, { conflict: conflictMessage }),
      async (manager) => {
        const password = await hashPassword(dto.password);
        const user = await manager.save(manager.create(User, { username: dto.username, email, password }));
        await manager.save(
          manager.create(UserProfile, {
            userId: user.id,
            firstName: dto.firstName,
            lastName: dto.lastName,
            avatar: null,
          }),
        );

        const created = await this.withProfile(manager, user.id);
        if (!created) return missing(user.id);
        this.logger.log(`Created user ${created.id}`);
        return ok(toUserView(created));
      },
    );
  }

  findOne(session: DbSession, id: number): Promise<ServiceResult<UserView>> {
    return session.read(this.context('fetching user', id), async (manager) => {
      const user = await this.withProfile(manager, id);
      return user ? ok(toUserView(user)) : missing(id);
    });
  }

  /** Credential lookup for sign-in; the only path that returns the hash. */
  findByEmail(session: DbSession, rawEmail: string): Promise<ServiceResult<User | null>> {
    const email = normalizeEmail(rawEmail);
    return session.read(this.context('fetching user by email', email), async (manager) =>
      ok(await manager.findOne(User, { where: { email }, relations: { profile: true } })),
    );
  }

  update(session: DbSession, id: number, dto: UpdateUserDto): Promise<ServiceResult<UserView>> {
    return session.unitOfWork(
      this.context('updating user', id, { conflict: conflictMessage }),
      async (manager) => {
        const user = await this.withProfile(manager, id);
        if (!user) return missing(id);

        const account: Partial<Pick<User, 'username' | 'email'>> = {};
        if (dto.username !== undefined) account.username = dto.username;
        if (dto.email !== undefined) account.email = normalizeEmail(dto.email);
        if (Object.keys(account).length > 0) {
          await manager.update(User, { id }, account);
        }

        const profile: Partial<Pick<UserProfile, 'firstName' | 'lastName' | 'avatar'>> = {};
        if (dto.firstName !== undefined) profile.firstName = dto.firstName;
        if (dto.lastName !== undefined) profile.lastName = dto.lastName;
        if (dto.avatar !== undefined) profile.avatar = dto.avatar;
        if (Object.keys(profile).length > 0) {
          if (!user.profile) return invalid(`User ${id} has no profile to update`);
          await manager.update(UserProfile, { userId: id }, profile);
        }

        const updated = await this.withProfile(manager, id);
        return updated ? ok(toUserView(updated)) : missing(id);
      },
    );
  }

  /** Owned rows (profile, accounts, expenses, budgets, goals, alerts) go with the user. */
  remove(session: DbSession, id: number): Promise<ServiceResult<void>> {
    return session.unitOfWork(
      this.context('deleting user', id, {
        invalid: 'User accounts are still referenced by transactions or recurring transactions',
      }),
      async (manager) => {
        const exists = await manager.existsBy(User, { id });
        if (!exists) return missing(id);

        await manager.delete(User, { id });
        this.logger.log(`Deleted user ${id}`);
        return ok(undefined);
      },
    );
  }
}
