import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AppointmentService } from './appointment.service';
import { SessionGuard } from '../auth/session.guard';
import { CurrentActor } from '../auth/current-actor.decorator';
import {
  parseNurseAssignmentBody,
  parseRequestAppointmentBody,
  parseRescheduleBody,
  parseStatusBody,
  parseStatusFilter,
} from './utils/appointment-request.utils';
import type { Actor } from '../auth/actor';
import type { AppointmentRecord } from './ports';

// Los errores de dominio ya son HttpException: Nest arma el 4xx/5xx solo
@Controller('appointments')
@UseGuards(SessionGuard)
export class AppointmentController {
  constructor(private readonly appointmentService: AppointmentService) {}

  @Post()
  async requestAppointment(
    @CurrentActor() actor: Actor,
    @Body() body: unknown,
  ): Promise<AppointmentRecord> {
    const input = parseRequestAppointmentBody(body);

    return this.appointmentService.requestAppointment(actor, {
      ...input,
      patientId: actor.userId,
    });
  }

  @Get()
  async list(
    @CurrentActor() actor: Actor,
    @Query('status') status?: string,
  ): Promise<AppointmentRecord[]> {
    return this.appointmentService.listForRole(actor, parseStatusFilter(status));
  }

  @Get(':id')
  async findOne(
    @CurrentActor() actor: Actor,
    @Param('id') appointmentId: string,
  ): Promise<AppointmentRecord> {
    return this.appointmentService.getAppointment(appointmentId, actor);
  }

  @Patch(':id/status')
  async setStatus(
    @CurrentActor() actor: Actor,
    @Param('id') appointmentId: string,
    @Body() body: unknown,
  ): Promise<AppointmentRecord> {
    return this.appointmentService.setStatus(
      appointmentId,
      parseStatusBody(body),
      actor,
    );
  }

  @Patch(':id/schedule')
  async reschedule(
    @CurrentActor() actor: Actor,
    @Param('id') appointmentId: string,
    @Body() body: unknown,
  ): Promise<AppointmentRecord> {
    return this.appointmentService.reschedule(
      appointmentId,
      parseRescheduleBody(body),
      actor,
    );
  }

  @Patch(':id/nurse')
  async assignNurse(
    @CurrentActor() actor: Actor,
    @Param('id') appointmentId: string,
    @Body() body: unknown,
  ): Promise<AppointmentRecord> {
    return this.appointmentService.assignNurse(
      appointmentId,
      parseNurseAssignmentBody(body),
      actor,
    );
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @CurrentActor() actor: Actor,
    @Param('id') appointmentId: string,
  ): Promise<void> {
    await this.appointmentService.deleteAppointment(appointmentId, actor);
  }
}
