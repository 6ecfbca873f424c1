import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSourceOptions } from 'typeorm';

type ConfigReader = Pick<ConfigService, 'get'>;

export const getDataSourceOptions = (config: ConfigReader): DataSourceOptions => {
  const isProduction = config.get<string>('NODE_ENV') === 'production';

  return {
    type: 'postgres',
    host: config.get<string>('DB_HOST') || 'localhost',
    port: parseInt(config.get<string>('DB_PORT') || '5432', 10),
    username: config.get<string>('DB_USERNAME') || 'postgres',
    password: config.get<string>('DB_PASSWORD') || 'postgres',
    database: config.get<string>('DB_NAME') || 'org_directory',
    entities: [__dirname + '/../**/*.entity{.ts,.js}'],
    migrations: [__dirname + '/../migrations/**/*{.ts,.js}'],
    synchronize: !isProduction, // в production только миграции
    logging: !isProduction,
    migrationsRun: isProduction,
    migrationsTableName: 'migrations',
    ssl:
      config.get<string>('DB_SSL') === 'true'
        ? { rejectUnauthorized: false }
        : false,
  };
};

export const getDatabaseConfig = (configService: ConfigService): TypeOrmModuleOptions =>
  getDataSourceOptions(configService);
