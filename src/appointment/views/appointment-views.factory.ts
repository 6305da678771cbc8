import { Injectable } from '@nestjs/common';
import { AppointmentService } from '../appointment.service';
import { AuthError } from '../errors/appointment.errors';
import { UserRole } from '../../user/enums/user-role.enum';
import { PatientAppointmentsView } from './patient-appointments.view';
import { DoctorAppointmentsView } from './doctor-appointments.view';
import { NurseAppointmentsView } from './nurse-appointments.view';
import type { Actor } from '../../auth/actor';

/**
 * Arma una vista nueva por actor. Las vistas no son providers: guardan
 * estado de un usuario y no se comparten.
 */
@Injectable()
export class AppointmentViewsFactory {
  constructor(private readonly appointmentService: AppointmentService) {}

  forPatient(actor: Actor): PatientAppointmentsView {
    this.assertRole(actor, UserRole.PATIENT);
    return new PatientAppointmentsView(this.appointmentService, actor);
  }

  forDoctor(actor: Actor): DoctorAppointmentsView {
    this.assertRole(actor, UserRole.DOCTOR);
    return new DoctorAppointmentsView(this.appointmentService, actor);
  }

  forNurse(actor: Actor): NurseAppointmentsView {
    this.assertRole(actor, UserRole.NURSE);
    return new NurseAppointmentsView(this.appointmentService, actor);
  }

  private assertRole(actor: Actor, role: UserRole): void {
    if (actor.role !== role || !actor.userId) {
      throw new AuthError(`Esta vista es solo para el rol ${role}.`);
    }
  }
}
