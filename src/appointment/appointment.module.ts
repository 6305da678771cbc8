import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Appointment } from './entities/appointment.entity';
import { AppointmentService } from './appointment.service';
import { AppointmentAdapter } from './appointment.adapter';
import { AppointmentController } from './appointment.controller';
import { DoctorController } from './doctor.controller';
import { AppointmentViewsFactory } from './views/appointment-views.factory';
import { APPOINTMENT_STORE } from './ports';
import { UserModule } from '../user/user.module';
import { NotificationModule } from '../notification/notification.module';
import { SessionGuard } from '../auth/session.guard';

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forFeature([Appointment]),
    UserModule, // USER_DIRECTORY y DOCTOR_DIRECTORY
    NotificationModule,
  ],
  controllers: [AppointmentController, DoctorController],
  providers: [
    AppointmentService,
    AppointmentViewsFactory,
    SessionGuard,
    // Binding puerto -> adaptador
    {
      provide: APPOINTMENT_STORE,
      useClass: AppointmentAdapter,
    },
  ],
  exports: [AppointmentService, AppointmentViewsFactory],
})
export class AppointmentModule {}
