import { Inject, Injectable } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import { InjectRepository } from '@nestjs/typeorm';
import { ILike, Repository } from 'typeorm';
import { User } from './entities/user.entity';
import { UserRole, parseUserRole } from './enums/user-role.enum';
import { isUuid } from '../database/database.utils';
import type {
  DoctorDirectoryPort,
  DoctorSummary,
  UserDirectoryPort,
  UserData,
} from '../appointment/ports';

/** Los ids se cachean 5 minutos: nombre y rol cambian muy poco */
const USER_CACHE_TTL_MS = 5 * 60 * 1000;

/**
 * Adaptador: implementa los puertos de usuarios y médicos con TypeORM.
 */
@Injectable()
export class UserAdapter implements UserDirectoryPort, DoctorDirectoryPort {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    @Inject(CACHE_MANAGER)
    private readonly cacheManager: Cache,
  ) {}

  async findById(userId: string): Promise<UserData | null> {
    if (!isUuid(userId)) {
      return null;
    }

    const cacheKey = `user:${userId}`;
    const cached = await this.cacheManager.get<UserData>(cacheKey);

    if (cached) {
      return cached;
    }

    const user = await this.userRepository.findOneBy({ id: userId });

    if (!user) {
      return null;
    }

    const data = this.toData(user);

    await this.cacheManager.set(cacheKey, data, USER_CACHE_TTL_MS);
    return data;
  }

  async exists(doctorId: string): Promise<boolean> {
    const user = await this.findById(doctorId);

    return user !== null && user.isActive && user.role === UserRole.DOCTOR;
  }

  async listAvailable(specialty?: string): Promise<DoctorSummary[]> {
    const doctors = await this.userRepository.find({
      where: {
        role: UserRole.DOCTOR,
        isActive: true,
        ...(specialty ? { specialty: ILike(specialty) } : {}),
      },
      order: { name: 'ASC' },
    });

    return doctors.map((doctor) => ({
      id: doctor.id,
      name: doctor.name,
      specialty: doctor.specialty,
    }));
  }

  private toData(user: User): UserData {
    return {
      id: user.id,
      name: user.name,
      role: parseUserRole(user.role),
      isActive: user.isActive,
    };
  }
}
