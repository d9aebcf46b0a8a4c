import { CliOutput } from '../../src/cli/cli-output.service';
import type { OutputStream } from '../../src/cli/cli-output.service';

export class RecordingOutput extends CliOutput {
  readonly lines: { stream: OutputStream; text: string }[] = [];

  get stdout(): string[] {
    return this.lines.filter((line) => line.stream === 'out').map((line) => line.text);
  }

  get stderr(): string[] {
    return this.lines.filter((line) => line.stream === 'err').map((line) => line.text);
  }

  protected write(stream: OutputStream, text: string): void {
    this.lines.push({ stream, text });
  }
}
