import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChatModule } from './chat/chat.module';
import { numberSetting, stringSetting, validateEnvironment } from './config/app.config';
import { ConversationSessionEntity, FormConfigurationEntity } from './database/entities';
import { FormsModule } from './forms/forms.module';
import { HealthModule } from './health/health.module';
import { IntakeModule } from './intake/intake.module';
import { LoggingModule } from './logging/logging.module';
import { MetricsModule } from './metrics/metrics.module';
import { SessionsModule } from './sessions/sessions.module';

@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        host: stringSetting(config, 'DATABASE_HOST', 'localhost'),
        port: numberSetting(config, 'DATABASE_PORT', 5432),
        username: stringSetting(config, 'DATABASE_USER', 'postgres'),
        password: stringSetting(config, 'DATABASE_PASSWORD', 'postgres'),
        database: stringSetting(config, 'DATABASE_NAME', 'formtalk'),
        entities: [FormConfigurationEntity, ConversationSessionEntity],
        // Schema changes go through migrations
        synchronize: false,
        logging: config.get<string>('NODE_ENV') === 'development',
      }),
    }),
    LoggingModule,
    MetricsModule,
    HealthModule,
    FormsModule,
    SessionsModule,
    IntakeModule,
    ChatModule,
  ],
})
export class AppModule {}
