import { DynamicModule, Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { DashboardConfig } from './config/dashboard.config';
import { StatsModule } from './stats/stats.module';

@Module({})
export class AppModule {
  // Config is loaded before the module graph so a missing secret stops startup.
  static forRoot(config: DashboardConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.forRoot(config), StatsModule],
      controllers: [AppController],
    };
  }
}
