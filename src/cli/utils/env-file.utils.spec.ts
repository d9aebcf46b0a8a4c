import { mergeEnvEntries } from './env-file.utils';

describe('mergeEnvEntries', () => {
  const entries = {
    EVOLUTION_API_URL: 'http://evolution.test',
    EVOLUTION_API_KEY: 'test-key',
  };

  it('agrega las claves que faltan al final', () => {
    const result = mergeEnvEntries('DB_HOST=localhost\n', entries, false);

    expect(result).toEqual({
      content:
        'DB_HOST=localhost\nEVOLUTION_API_URL=http://evolution.test\nEVOLUTION_API_KEY=test-key\n',
      written: ['EVOLUTION_API_URL', 'EVOLUTION_API_KEY'],
      skipped: [],
    });
  });

  it('conserva las claves existentes sin force', () => {
    const result = mergeEnvEntries(
      'EVOLUTION_API_KEY=old-key\n# comentario\n',
      entries,
      false,
    );

    expect(result.content).toBe(
      'EVOLUTION_API_KEY=old-key\n# comentario\nEVOLUTION_API_URL=http://evolution.test\n',
    );
    expect(result.skipped).toEqual(['EVOLUTION_API_KEY']);
  });

  it('reemplaza en su lugar con force', () => {
    const result = mergeEnvEntries('EVOLUTION_API_KEY=old-key\nPORT=3000', entries, true);

    expect(result.content).toBe(
      'EVOLUTION_API_KEY=test-key\nPORT=3000\nEVOLUTION_API_URL=http://evolution.test\n',
    );
    expect(result.written).toEqual(['EVOLUTION_API_URL', 'EVOLUTION_API_KEY']);
  });

  it('entrecomilla valores con espacios', () => {
    const result = mergeEnvEntries('', { EVOLUTION_DEFAULT_INSTANCE: 'mi "bot"' }, false);

    expect(result.content).toBe('EVOLUTION_DEFAULT_INSTANCE="mi \\"bot\\""\n');
  });
});
