import { AppointmentStatus } from '../enums/appointment-status.enum';
import { AppointmentsView } from './appointments-view';
import type { AppointmentService } from '../appointment.service';
import type { Actor } from '../../auth/actor';

export class DoctorAppointmentsView extends AppointmentsView {
  constructor(appointmentService: AppointmentService, actor: Actor) {
    super(appointmentService, actor);
  }

  approve(appointmentId: string): Promise<boolean> {
    return this.changeStatus(appointmentId, AppointmentStatus.CONFIRMED);
  }

  decline(appointmentId: string): Promise<boolean> {
    return this.changeStatus(appointmentId, AppointmentStatus.DECLINED);
  }

  complete(appointmentId: string): Promise<boolean> {
    return this.changeStatus(appointmentId, AppointmentStatus.COMPLETED);
  }

  reschedule(appointmentId: string, dateTime: Date): Promise<boolean> {
    return this.mutate(
      appointmentId,
      (appointment) => ({ ...appointment, dateTime }),
      () =>
        this.appointmentService.reschedule(appointmentId, dateTime, this.actor),
    );
  }

  assignNurse(appointmentId: string, nurseId: string | null): Promise<boolean> {
    return this.mutate(
      appointmentId,
      (appointment) => ({ ...appointment, nurseId }),
      () =>
        this.appointmentService.assignNurse(appointmentId, nurseId, this.actor),
    );
  }

  deleteAppointment(appointmentId: string): Promise<boolean> {
    return this.remove(appointmentId, () =>
      this.appointmentService.deleteAppointment(appointmentId, this.actor),
    );
  }

  private changeStatus(
    appointmentId: string,
    status: AppointmentStatus,
  ): Promise<boolean> {
    return this.mutate(
      appointmentId,
      (appointment) => ({ ...appointment, status }),
      () =>
        this.appointmentService.setStatus(appointmentId, status, this.actor),
    );
  }
}
