import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES } from './entities';

const IN_MEMORY = ':memory:';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const path = config.get<string>('database.path') ?? 'inventory.sqlite';
        // sql.js keeps the database in memory and writes the file back after each commit.
        return {
          type: 'sqljs' as const,
          ...(path === IN_MEMORY ? {} : { location: path, autoSave: true }),
          entities: ENTITIES,
          synchronize: config.get<boolean>('database.synchronize') ?? true,
        };
      },
    }),
  ],
})
export class DatabaseModule {}
