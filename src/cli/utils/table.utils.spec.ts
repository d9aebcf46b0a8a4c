import { formatTable } from './table.utils';

describe('formatTable', () => {
  it('ajusta cada columna al valor más largo', () => {
    expect(
      formatTable(
        ['Instance', 'Status'],
        [
          ['ventas', 'open'],
          ['soporte-nocturno', null],
        ],
      ),
    ).toEqual([
      '+------------------+--------+',
      '| Instance         | Status |',
      '+------------------+--------+',
      '| ventas           | open   |',
      '| soporte-nocturno | -      |',
      '+------------------+--------+',
    ]);
  });

  it('imprime sólo encabezados sin filas', () => {
    expect(formatTable(['A'], [])).toEqual(['+---+', '| A |', '+---+', '+---+']);
  });
});
