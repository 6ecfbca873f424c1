import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { getDataSourceOptions } from './database.config';

// Для CLI typeorm (migration:run / migration:revert)
export default new DataSource({
  ...getDataSourceOptions(new ConfigService(process.env)),
  synchronize: false,
  migrationsRun: false,
});
