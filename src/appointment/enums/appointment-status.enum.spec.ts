import {
  AppointmentStatus,
  isAppointmentStatus,
  parseAppointmentStatus,
} from './appointment-status.enum';

describe('parseAppointmentStatus', () => {
  it('decodifica los valores conocidos', () => {
    expect(parseAppointmentStatus('confirmed')).toBe(AppointmentStatus.CONFIRMED);
    expect(parseAppointmentStatus('declined')).toBe(AppointmentStatus.DECLINED);
  });

  it('tolera mayúsculas y espacios', () => {
    expect(parseAppointmentStatus('  Scheduled ')).toBe(
      AppointmentStatus.SCHEDULED,
    );
  });

  it.each([['archived'], [''], [null], [undefined], [42]])(
    'lee %p como pending',
    (value) => {
      expect(parseAppointmentStatus(value)).toBe(AppointmentStatus.PENDING);
    },
  );
});

describe('isAppointmentStatus', () => {
  it('es estricto', () => {
    expect(isAppointmentStatus('completed')).toBe(true);
    expect(isAppointmentStatus('Completed')).toBe(false);
    expect(isAppointmentStatus(undefined)).toBe(false);
  });
});
