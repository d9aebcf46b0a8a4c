import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';

/**
 * El CLI arranca con la conexión sin inicializar (`manualInitialization`):
 * sólo los comandos que tocan la base la abren.
 */
@Injectable()
export class CliDatabase {
  constructor(private readonly dataSource: DataSource) {}

  async connect(): Promise<void> {
    if (!this.dataSource.isInitialized) {
      await this.dataSource.initialize();
    }
  }

  async runMigrations(): Promise<string[]> {
    await this.connect();
    const executed = await this.dataSource.runMigrations({ transaction: 'each' });
    return executed.map((migration) => migration.name);
  }
}
