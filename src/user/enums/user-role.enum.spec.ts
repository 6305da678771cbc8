import { UserRole, parseUserRole } from './user-role.enum';

describe('parseUserRole', () => {
  it.each([
    ['patient', UserRole.PATIENT],
    ['DOCTOR', UserRole.DOCTOR],
    [' nurse ', UserRole.NURSE],
    ['admin', UserRole.ADMIN],
    ['recepcion', UserRole.UNKNOWN],
  ])('%p → %s', (value, expected) => {
    expect(parseUserRole(value)).toBe(expected);
  });

  it('un valor que no es texto es unknown', () => {
    expect(parseUserRole(null)).toBe(UserRole.UNKNOWN);
  });
});
