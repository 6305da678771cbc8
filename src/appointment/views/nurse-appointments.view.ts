import { AppointmentStatus } from '../enums/appointment-status.enum';
import { AppointmentsView } from './appointments-view';
import type { AppointmentService } from '../appointment.service';
import type { Actor } from '../../auth/actor';

// Enfermería solo ve sus turnos asignados y los pasa a agendados
export class NurseAppointmentsView extends AppointmentsView {
  constructor(appointmentService: AppointmentService, actor: Actor) {
    super(appointmentService, actor);
  }

  markScheduled(appointmentId: string): Promise<boolean> {
    return this.mutate(
      appointmentId,
      (appointment) => ({
        ...appointment,
        status: AppointmentStatus.SCHEDULED,
      }),
      () =>
        this.appointmentService.setStatus(
          appointmentId,
          AppointmentStatus.SCHEDULED,
          this.actor,
        ),
    );
  }
}
