import { DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

type EntityClass = new () => object;

/** In-memory database for specs; mirrors the entities the module under test registers. */
export function sqliteTestingModules(
  entities: EntityClass[],
): DynamicModule[] {
  return [
    TypeOrmModule.forRoot({
      type: 'better-sqlite3',
      database: ':memory:',
      entities,
      synchronize: true,
      dropSchema: true,
    }),
    TypeOrmModule.forFeature(entities),
  ];
}
