import { AppointmentStatus } from '../enums/appointment-status.enum';
import { UserRole } from '../../user/enums/user-role.enum';
import {
  allowedTransitions,
  canBeApprovedOrDeclined,
  canBeCancelled,
  canBeCompletedByDoctor,
  canBeDeletedByDoctor,
  canBeRescheduled,
  canReschedule,
  canTransition,
  isRescheduleRole,
  isTerminalStatus,
} from './appointment-status.policy';

const ALL_STATUSES = Object.values(AppointmentStatus);
const ALL_ROLES = Object.values(UserRole);

const ALLOWED: ReadonlyArray<[AppointmentStatus, AppointmentStatus, UserRole]> =
  [
    [AppointmentStatus.PENDING, AppointmentStatus.CONFIRMED, UserRole.DOCTOR],
    [AppointmentStatus.PENDING, AppointmentStatus.DECLINED, UserRole.DOCTOR],
    [AppointmentStatus.PENDING, AppointmentStatus.CANCELLED, UserRole.PATIENT],
    [AppointmentStatus.CONFIRMED, AppointmentStatus.CANCELLED, UserRole.PATIENT],
    [AppointmentStatus.CONFIRMED, AppointmentStatus.SCHEDULED, UserRole.DOCTOR],
    [AppointmentStatus.CONFIRMED, AppointmentStatus.SCHEDULED, UserRole.NURSE],
    [AppointmentStatus.CONFIRMED, AppointmentStatus.COMPLETED, UserRole.DOCTOR],
    [AppointmentStatus.SCHEDULED, AppointmentStatus.COMPLETED, UserRole.DOCTOR],
  ];

function isListed(
  from: AppointmentStatus,
  to: AppointmentStatus,
  role: UserRole,
): boolean {
  return ALLOWED.some(([f, t, r]) => f === from && t === to && r === role);
}

describe('AppointmentStatusPolicy', () => {
  describe('canTransition', () => {
    it('solo permite las combinaciones de la tabla', () => {
      for (const from of ALL_STATUSES) {
        for (const to of ALL_STATUSES) {
          for (const role of ALL_ROLES) {
            expect({ from, to, role, allowed: canTransition(from, to, role) }).toEqual({
              from,
              to,
              role,
              allowed: isListed(from, to, role),
            });
          }
        }
      }
    });

    it('nunca permite salir de un estado terminal', () => {
      const terminal = ALL_STATUSES.filter(isTerminalStatus);

      expect(terminal).toEqual([
        AppointmentStatus.COMPLETED,
        AppointmentStatus.CANCELLED,
        AppointmentStatus.DECLINED,
      ]);
      for (const from of terminal) {
        for (const role of ALL_ROLES) {
          expect(allowedTransitions(from, role)).toEqual([]);
        }
      }
    });

    it('rechaza pasar al mismo estado', () => {
      for (const status of ALL_STATUSES) {
        for (const role of ALL_ROLES) {
          expect(canTransition(status, status, role)).toBe(false);
        }
      }
    });

    it('no deja cancelar un turno agendado aunque canBeCancelled diga que sí', () => {
      expect(canBeCancelled(AppointmentStatus.SCHEDULED)).toBe(true);
      expect(
        canTransition(
          AppointmentStatus.SCHEDULED,
          AppointmentStatus.CANCELLED,
          UserRole.PATIENT,
        ),
      ).toBe(false);
    });
  });

  describe('allowedTransitions', () => {
    it('lista los destinos del médico desde pending', () => {
      expect(
        allowedTransitions(AppointmentStatus.PENDING, UserRole.DOCTOR),
      ).toEqual([AppointmentStatus.CONFIRMED, AppointmentStatus.DECLINED]);
    });

    it('lista los destinos del médico desde confirmed', () => {
      expect(
        allowedTransitions(AppointmentStatus.CONFIRMED, UserRole.DOCTOR),
      ).toEqual([AppointmentStatus.SCHEDULED, AppointmentStatus.COMPLETED]);
    });

    it('enfermería solo agenda', () => {
      expect(
        allowedTransitions(AppointmentStatus.CONFIRMED, UserRole.NURSE),
      ).toEqual([AppointmentStatus.SCHEDULED]);
      expect(
        allowedTransitions(AppointmentStatus.PENDING, UserRole.NURSE),
      ).toEqual([]);
    });

    it('admin y unknown no tienen transiciones', () => {
      for (const status of ALL_STATUSES) {
        expect(allowedTransitions(status, UserRole.ADMIN)).toEqual([]);
        expect(allowedTransitions(status, UserRole.UNKNOWN)).toEqual([]);
      }
    });
  });

  describe('predicados', () => {
    it.each([
      [AppointmentStatus.PENDING, true, true, false, true, false],
      [AppointmentStatus.CONFIRMED, false, true, true, true, false],
      [AppointmentStatus.SCHEDULED, false, true, true, true, false],
      [AppointmentStatus.COMPLETED, false, false, false, false, true],
      [AppointmentStatus.CANCELLED, false, false, false, false, true],
      [AppointmentStatus.DECLINED, false, false, false, false, true],
    ])(
      '%s',
      (status, approveOrDecline, cancel, complete, reschedule, purge) => {
        expect(canBeApprovedOrDeclined(status)).toBe(approveOrDecline);
        expect(canBeCancelled(status)).toBe(cancel);
        expect(canBeCompletedByDoctor(status)).toBe(complete);
        expect(canBeRescheduled(status)).toBe(reschedule);
        expect(canBeDeletedByDoctor(status)).toBe(purge);
      },
    );
  });

  describe('canReschedule', () => {
    it('paciente y médico pueden reprogramar turnos activos', () => {
      expect(canReschedule(AppointmentStatus.PENDING, UserRole.PATIENT)).toBe(true);
      expect(canReschedule(AppointmentStatus.SCHEDULED, UserRole.DOCTOR)).toBe(true);
    });

    it('enfermería no reprograma', () => {
      expect(canReschedule(AppointmentStatus.CONFIRMED, UserRole.NURSE)).toBe(false);
    });

    it('nadie reprograma un turno cerrado', () => {
      expect(canReschedule(AppointmentStatus.COMPLETED, UserRole.DOCTOR)).toBe(false);
    });

    it('isRescheduleRole solo acepta paciente y médico', () => {
      expect(ALL_ROLES.filter(isRescheduleRole)).toEqual([
        UserRole.PATIENT,
        UserRole.DOCTOR,
      ]);
    });
  });
});
