import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { UserAdapter } from './user.adapter';
import { DOCTOR_DIRECTORY, USER_DIRECTORY } from '../appointment/ports';

/**
 * Un solo adaptador sirve los dos puertos (usuarios y médicos).
 */
@Module({
  imports: [TypeOrmModule.forFeature([User])],
  providers: [
    UserAdapter,
    { provide: USER_DIRECTORY, useExisting: UserAdapter },
    { provide: DOCTOR_DIRECTORY, useExisting: UserAdapter },
  ],
  exports: [USER_DIRECTORY, DOCTOR_DIRECTORY],
})
export class UserModule {}
