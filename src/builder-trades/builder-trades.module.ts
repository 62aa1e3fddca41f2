import { Module } from '@nestjs/common';
import { DASHBOARD_CONFIG, DashboardConfig } from '../config/dashboard.config';
import { BUILDER_HTTP_CLIENT, createBuilderHttpClient } from './builder-http.client';
import { BuilderTradesClient } from './builder-trades.client';

@Module({
  providers: [
    {
      provide: BUILDER_HTTP_CLIENT,
      inject: [DASHBOARD_CONFIG],
      useFactory: (config: DashboardConfig) => createBuilderHttpClient(config.upstream),
    },
    BuilderTradesClient,
  ],
  exports: [BuilderTradesClient],
})
export class BuilderTradesModule {}
