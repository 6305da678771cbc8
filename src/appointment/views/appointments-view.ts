import { Logger } from '@nestjs/common';
import { AppointmentStatus } from '../enums/appointment-status.enum';
import { AppointmentError } from '../errors/appointment.errors';
import { allowedTransitions } from '../policy/appointment-status.policy';
import { runOptimistic } from './optimistic-update';
import type { StateCell } from './optimistic-update';
import type { AppointmentService } from '../appointment.service';
import type { AppointmentRecord } from '../ports';
import type { Actor } from '../../auth/actor';

export const UNEXPECTED_ERROR_MESSAGE =
  'Ocurrió un error inesperado. Intentá de nuevo.';

// Cambio confirmado en el servidor; `record` null es un borrado
interface CommittedChange {
  epoch: number;
  appointmentId: string;
  record: AppointmentRecord | null;
}

// Lo que `apply` dejó en la lista y lo que había antes
interface OptimisticEntry {
  previous: AppointmentRecord;
  optimistic: AppointmentRecord;
}

/**
 * AppointmentsView - Lista cacheada de turnos de un actor.
 *
 * Cada vista es de un solo usuario y no comparte estado con otras: la
 * consistencia entre roles sale de volver a llamar a `load()`.
 */
export abstract class AppointmentsView {
  protected readonly logger = new Logger(this.constructor.name);

  private appointmentList: AppointmentRecord[] = [];
  private filter: AppointmentStatus | null = null;
  private busyCount = 0;
  private errorMessage: string | null = null;
  private loadSequence = 0;

  // Cada commit o borrado sube la época; una carga que arrancó antes
  // vuelve a aplicar esos cambios sobre lo que trajo
  private epoch = 0;
  private loadsInFlight = 0;
  private recentChanges: CommittedChange[] = [];

  // Una mutación en vuelo por turno
  private readonly inFlight = new Set<string>();

  private readonly listCell: StateCell<AppointmentRecord[]> = {
    get: () => this.appointmentList,
    set: (appointments) => {
      this.appointmentList = appointments;
    },
  };

  protected constructor(
    protected readonly appointmentService: AppointmentService,
    readonly actor: Actor,
  ) {}

  get appointments(): readonly AppointmentRecord[] {
    return this.appointmentList;
  }

  get statusFilter(): AppointmentStatus | null {
    return this.filter;
  }

  get isBusy(): boolean {
    return this.busyCount > 0;
  }

  get lastError(): string | null {
    return this.errorMessage;
  }

  /**
   * Reemplaza la lista completa. Si mientras tanto arrancó otra carga, el
   * resultado de esta se descarta y devuelve `false`. Los cambios que esta
   * vista confirmó durante la carga se vuelven a aplicar sobre el resultado.
   */
  async load(): Promise<boolean> {
    const sequence = ++this.loadSequence;
    const startedAt = this.epoch;

    this.busyCount++;
    this.loadsInFlight++;

    try {
      const appointments = await this.appointmentService.listForRole(
        this.actor,
        this.filter ?? undefined,
      );

      if (sequence !== this.loadSequence) {
        return false;
      }

      this.appointmentList = this.reapplyChanges(appointments, startedAt);
      this.errorMessage = null;
      return true;
    } catch (error: unknown) {
      if (sequence === this.loadSequence) {
        this.errorMessage = this.describeError(error);
      }

      return false;
    } finally {
      this.busyCount--;
      this.loadsInFlight--;

      if (this.loadsInFlight === 0) {
        this.recentChanges = [];
      }
    }
  }

  // El filtrado es del lado del servidor
  setStatusFilter(status: AppointmentStatus | null): Promise<boolean> {
    this.filter = status;
    return this.load();
  }

  /** Estados a los que este actor puede mover el turno. */
  allowedStatuses(appointment: AppointmentRecord): AppointmentStatus[] {
    return allowedTransitions(appointment.status, this.actor.role);
  }

  isInFlight(appointmentId: string): boolean {
    return this.inFlight.has(appointmentId);
  }

  /**
   * Aplica `patch` localmente y llama a `action`. Con éxito reemplaza solo
   * ese turno por el del servidor; si falla lo vuelve a su snapshot.
   */
  protected async mutate(
    appointmentId: string,
    patch: (appointment: AppointmentRecord) => AppointmentRecord,
    action: () => Promise<AppointmentRecord>,
  ): Promise<boolean> {
    if (this.inFlight.has(appointmentId)) {
      return false;
    }

    this.inFlight.add(appointmentId);
    this.busyCount++;

    try {
      await runOptimistic<
        AppointmentRecord[],
        AppointmentRecord,
        OptimisticEntry | null
      >(this.listCell, action, {
        apply: (appointments) => {
          const previous = appointments.find(
            (appointment) => appointment.id === appointmentId,
          );

          if (!previous) {
            return { state: appointments, snapshot: null };
          }

          const optimistic = patch(previous);

          return {
            state: replaceById(appointments, optimistic),
            snapshot: { previous, optimistic },
          };
        },
        commit: (appointments, saved) => {
          this.recordChange(saved.id, saved);
          return this.mergeCommitted(appointments, saved);
        },
        // Solo se deshace si la entrada sigue siendo la que puso `apply`
        revert: (appointments, snapshot) =>
          snapshot &&
          appointments.some((appointment) => appointment === snapshot.optimistic)
            ? replaceById(appointments, snapshot.previous)
            : appointments,
      });

      this.errorMessage = null;
      return true;
    } catch (error: unknown) {
      this.errorMessage = this.describeError(error);
      this.logger.warn(
        `⚠️ Cambio revertido en turno ${appointmentId}: ${this.errorMessage}`,
      );
      return false;
    } finally {
      this.inFlight.delete(appointmentId);
      this.busyCount--;
    }
  }

  /** Quita el turno de la lista solo si `action` se completó. */
  protected async remove(
    appointmentId: string,
    action: () => Promise<void>,
  ): Promise<boolean> {
    if (this.inFlight.has(appointmentId)) {
      return false;
    }

    this.inFlight.add(appointmentId);
    this.busyCount++;

    try {
      await action();

      this.recordChange(appointmentId, null);
      this.appointmentList = this.appointmentList.filter(
        (appointment) => appointment.id !== appointmentId,
      );
      this.errorMessage = null;
      return true;
    } catch (error: unknown) {
      this.errorMessage = this.describeError(error);
      return false;
    } finally {
      this.inFlight.delete(appointmentId);
      this.busyCount--;
    }
  }

  /** Corre `work` marcando la vista como ocupada; `null` si falló. */
  protected async track<T>(work: () => Promise<T>): Promise<T | null> {
    this.busyCount++;

    try {
      const result = await work();

      this.errorMessage = null;
      return result;
    } catch (error: unknown) {
      this.errorMessage = this.describeError(error);
      return null;
    } finally {
      this.busyCount--;
    }
  }

  /** Agrega un turno nuevo respetando el filtro y el orden por fecha. */
  protected insert(appointment: AppointmentRecord): void {
    if (!this.matchesFilter(appointment)) {
      return;
    }

    this.appointmentList = sortByDate([...this.appointmentList, appointment]);
  }

  private recordChange(
    appointmentId: string,
    record: AppointmentRecord | null,
  ): void {
    this.epoch++;

    if (this.loadsInFlight > 0) {
      this.recentChanges.push({ epoch: this.epoch, appointmentId, record });
    }
  }

  private reapplyChanges(
    loaded: AppointmentRecord[],
    startedAt: number,
  ): AppointmentRecord[] {
    return this.recentChanges
      .filter((change) => change.epoch > startedAt)
      .reduce(
        (appointments, change) =>
          change.record
            ? this.mergeCommitted(appointments, change.record)
            : appointments.filter(
                (appointment) => appointment.id !== change.appointmentId,
              ),
        loaded,
      );
  }

  /**
   * Deja `saved` en la lista salvo que ya haya una versión más nueva. Si no
   * coincide con el filtro, sale.
   */
  private mergeCommitted(
    appointments: AppointmentRecord[],
    saved: AppointmentRecord,
  ): AppointmentRecord[] {
    const current = appointments.find(
      (appointment) => appointment.id === saved.id,
    );

    if (current && current.version > saved.version) {
      return appointments;
    }

    if (!this.matchesFilter(saved)) {
      return appointments.filter((appointment) => appointment.id !== saved.id);
    }

    return current
      ? replaceById(appointments, saved)
      : sortByDate([...appointments, saved]);
  }

  private matchesFilter(appointment: AppointmentRecord): boolean {
    return this.filter === null || appointment.status === this.filter;
  }

  private describeError(error: unknown): string {
    if (error instanceof AppointmentError) {
      return error.message;
    }

    this.logger.error(
      `❌ Error inesperado: ${error instanceof Error ? error.message : String(error)}`,
    );
    return UNEXPECTED_ERROR_MESSAGE;
  }
}

function replaceById(
  appointments: AppointmentRecord[],
  replacement: AppointmentRecord,
): AppointmentRecord[] {
  return appointments.map((appointment) =>
    appointment.id === replacement.id ? replacement : appointment,
  );
}

function sortByDate(appointments: AppointmentRecord[]): AppointmentRecord[] {
  return appointments.sort((a, b) => a.dateTime.getTime() - b.dateTime.getTime());
}
