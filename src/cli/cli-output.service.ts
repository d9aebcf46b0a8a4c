import { Injectable } from '@nestjs/common';
import { formatTable } from './utils/table.utils';
import type { TableCell } from './utils/table.utils';

export type OutputStream = 'out' | 'err';

/**
 * Salida de los comandos. Los tests la reemplazan por una que acumula líneas.
 */
@Injectable()
export class CliOutput {
  line(text = ''): void {
    this.write('out', text);
  }

  info(text: string): void {
    this.write('out', `🔎 ${text}`);
  }

  success(text: string): void {
    this.write('out', `✅ ${text}`);
  }

  warn(text: string): void {
    this.write('err', `⚠️  ${text}`);
  }

  error(text: string): void {
    this.write('err', `❌ ${text}`);
  }

  table(headers: string[], rows: TableCell[][]): void {
    for (const line of formatTable(headers, rows)) {
      this.write('out', line);
    }
  }

  protected write(stream: OutputStream, text: string): void {
    if (stream === 'err') {
      console.error(text);
    } else {
      console.log(text);
    }
  }
}
