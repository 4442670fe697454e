import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AppController } from './app.controller';
import { envValidationSchema } from './config/env.validation';
import { prescriptionSafetyOptionsFromEnv } from './config/prescription-safety.options';
import { PrescriptionSafetyModule } from './prescription-safety/prescription-safety.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema: envValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
    }),
    PrescriptionSafetyModule.forRootAsync({
      useFactory: (configService: ConfigService) =>
        prescriptionSafetyOptionsFromEnv(configService),
      inject: [ConfigService],
    }),
  ],
  controllers: [AppController],
})
export class AppModule {}
