import type { BullModuleOptions } from '@nestjs/bull';
import { isRecord } from '../common/record.utils';
import { testConfig } from '../../test/fakes/test-config';
import { messageQueueOptions, webhookQueueOptions } from './queue.options';

// Bull resuelve `backoff: {type: 'staircase'}` con la estrategia registrada
function staircaseDelays(
  options: BullModuleOptions,
  attempts: number[],
): unknown[] {
  const strategies: unknown = options.settings?.backoffStrategies;
  const strategy = isRecord(strategies) ? strategies.staircase : undefined;

  if (typeof strategy !== 'function') {
    throw new Error('staircase backoff not registered');
  }

  return attempts.map((attemptsMade): unknown =>
    strategy(attemptsMade, new Error('falló el envío')),
  );
}

describe('queue options', () => {
  describe('messageQueueOptions', () => {
    it('usa el nombre configurado y la tabla de espera por intento', () => {
      const options = messageQueueOptions(testConfig());

      expect(options.name).toBe('evolution-api');
      expect(staircaseDelays(options, [1, 2, 3, 4])).toEqual([
        60_000, 300_000, 900_000, 900_000,
      ]);
    });

    it('respeta una tabla de espera personalizada', () => {
      const options = messageQueueOptions(
        testConfig({ queue: { backoff: [5, 10] } }),
      );

      expect(staircaseDelays(options, [1, 2, 3])).toEqual([
        5_000, 10_000, 10_000,
      ]);
    });

    it('limita los envíos por ventana', () => {
      const options = messageQueueOptions(
        testConfig({ rateLimit: { maxMessages: 12, windowMs: 30_000 } }),
      );

      expect(options.limiter).toEqual({ max: 12, duration: 30_000 });
    });

    it('no registra limitador cuando está desactivado', () => {
      const options = messageQueueOptions(
        testConfig({ rateLimit: { enabled: false } }),
      );

      expect(options.limiter).toBeUndefined();
    });
  });

  describe('webhookQueueOptions', () => {
    it('usa su propia tabla de espera y no limita', () => {
      const options = webhookQueueOptions(
        testConfig({ webhook: { queueName: 'hooks' } }),
      );

      expect(options.name).toBe('hooks');
      expect(staircaseDelays(options, [1, 2, 3])).toEqual([
        10_000, 30_000, 60_000,
      ]);
      expect(options.limiter).toBeUndefined();
    });
  });
});
