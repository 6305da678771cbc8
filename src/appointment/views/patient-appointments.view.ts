import { AppointmentStatus } from '../enums/appointment-status.enum';
import { AppointmentsView } from './appointments-view';
import type {
  AppointmentService,
  RequestAppointmentInput,
} from '../appointment.service';
import type { AppointmentRecord } from '../ports';
import type { Actor } from '../../auth/actor';

export type PatientAppointmentRequest = Omit<
  RequestAppointmentInput,
  'patientId'
>;

export class PatientAppointmentsView extends AppointmentsView {
  constructor(appointmentService: AppointmentService, actor: Actor) {
    super(appointmentService, actor);
  }

  async requestAppointment(
    request: PatientAppointmentRequest,
  ): Promise<AppointmentRecord | null> {
    const created = await this.track(() =>
      this.appointmentService.requestAppointment(this.actor, {
        ...request,
        patientId: this.actor.userId,
      }),
    );

    if (created) {
      this.insert(created);
    }

    return created;
  }

  cancel(appointmentId: string): Promise<boolean> {
    return this.mutate(
      appointmentId,
      (appointment) => ({
        ...appointment,
        status: AppointmentStatus.CANCELLED,
      }),
      () =>
        this.appointmentService.setStatus(
          appointmentId,
          AppointmentStatus.CANCELLED,
          this.actor,
        ),
    );
  }

  reschedule(appointmentId: string, dateTime: Date): Promise<boolean> {
    return this.mutate(
      appointmentId,
      (appointment) => ({ ...appointment, dateTime }),
      () =>
        this.appointmentService.reschedule(appointmentId, dateTime, this.actor),
    );
  }
}
