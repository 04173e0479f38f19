// apps/api/src/app.module.ts
import { Logger, Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AppController } from './app.controller';
import { MessagesModule } from './messages/messages.module';
import {
  buildTypeOrmOptions,
  describeDatabase,
  ensureDatabaseDirectory,
} from './database/database.config';

const logger = new Logger('AppModule');

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: process.env.NODE_ENV === 'test' ? '.env.test' : '.env',
      ignoreEnvFile: process.env.NODE_ENV === 'production',
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService): TypeOrmModuleOptions => {
        const nodeEnv = configService.get<string>('NODE_ENV');
        const options = buildTypeOrmOptions((key) =>
          configService.get<string>(key),
        );

        logger.log(
          `Running in NODE_ENV: ${nodeEnv ?? 'development'}, using ${describeDatabase(options)}`,
        );
        if (nodeEnv === 'production' && options.type !== 'postgres') {
          logger.warn(
            'DATABASE_URL is not set in production, falling back to SQLite',
          );
        }

        ensureDatabaseDirectory(options);
        return options;
      },
    }),
    MessagesModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
