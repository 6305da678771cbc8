import { signSessionToken, verifySessionToken } from './session-token';

const SECRET = 'test-secret';

describe('session token', () => {
  it('firma y verifica', () => {
    const token = signSessionToken('patient-1', SECRET);

    expect(token.startsWith('patient-1.')).toBe(true);
    expect(verifySessionToken(token, SECRET)).toBe('patient-1');
  });

  it('acepta ids que contienen puntos', () => {
    const token = signSessionToken('ana.perez', SECRET);

    expect(verifySessionToken(token, SECRET)).toBe('ana.perez');
  });

  it('rechaza otra clave', () => {
    const token = signSessionToken('patient-1', SECRET);

    expect(verifySessionToken(token, 'other-secret')).toBeNull();
  });

  it('rechaza un userId cambiado', () => {
    const signature = signSessionToken('patient-1', SECRET).split('.')[1];

    expect(verifySessionToken(`doctor-1.${signature}`, SECRET)).toBeNull();
  });

  it.each([['sin-punto'], ['.firma'], ['patient-1.'], ['patient-1.abc']])(
    'rechaza %p',
    (token) => {
      expect(verifySessionToken(token, SECRET)).toBeNull();
    },
  );
});
