import { backoffDelayMs } from './backoff.utils';

describe('backoffDelayMs', () => {
  const schedule = [60, 300, 900];

  it('usa la entrada de la tabla según el intento fallido', () => {
    expect(backoffDelayMs(schedule, 1)).toBe(60_000);
    expect(backoffDelayMs(schedule, 2)).toBe(300_000);
    expect(backoffDelayMs(schedule, 3)).toBe(900_000);
  });

  it('repite la última entrada cuando se acaba la tabla', () => {
    expect(backoffDelayMs(schedule, 7)).toBe(900_000);
  });

  it('trata intentos < 1 como el primero y tablas vacías como 0', () => {
    expect(backoffDelayMs(schedule, 0)).toBe(60_000);
    expect(backoffDelayMs([], 2)).toBe(0);
  });
});
