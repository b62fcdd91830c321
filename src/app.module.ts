import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validatePowerOceanEnv } from './config/powerocean.config';
import { HealthModule } from './health/health.module';
import { PowerOceanModule } from './powerocean';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validatePowerOceanEnv,
    }),
    PowerOceanModule,
    HealthModule,
  ],
})
export class AppModule {}
