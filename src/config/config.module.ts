import { DynamicModule, Global, Module } from '@nestjs/common';
import { DASHBOARD_CONFIG, DashboardConfig } from './dashboard.config';

@Global()
@Module({})
export class ConfigModule {
  static forRoot(config: DashboardConfig): DynamicModule {
    return {
      module: ConfigModule,
      providers: [{ provide: DASHBOARD_CONFIG, useValue: config }],
      exports: [DASHBOARD_CONFIG],
    };
  }
}
