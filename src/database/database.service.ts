import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

@Injectable()
export class DatabaseService {
  private readonly logger = new Logger(DatabaseService.name);

  constructor(private readonly dataSource: DataSource) {}

  /**
   * Connect (if needed) and create any missing tables.
   * Safe to call repeatedly.
   */
  async init(): Promise<DataSource> {
    if (!this.dataSource.isInitialized) {
      await this.dataSource.initialize();
      this.logger.log(`Connected to ${this.dataSource.options.type} database`);
    }

    await this.dataSource.synchronize();
    this.logger.log('Database schema synchronized');

    return this.dataSource;
  }
}
