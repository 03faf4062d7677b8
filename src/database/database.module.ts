import { DynamicModule, Global, Logger, Module } from '@nestjs/common';
import { DataSource, DataSourceOptions } from 'typeorm';
import { DatabaseService } from './database.service';

@Global()
@Module({})
export class DatabaseModule {
  static forRoot(options: DataSourceOptions): DynamicModule {
    return {
      module: DatabaseModule,
      providers: [
        {
          provide: DataSource,
          useFactory: async () => {
            const dataSource = await new DataSource(options).initialize();
            new Logger(DatabaseModule.name).log(`Connected to ${options.type} database`);
            return dataSource;
          },
        },
        DatabaseService,
      ],
      exports: [DataSource, DatabaseService],
    };
  }
}
