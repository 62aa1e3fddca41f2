import { Module } from '@nestjs/common';
import { BuilderTradesModule } from '../builder-trades/builder-trades.module';
import { StatsController } from './stats.controller';
import { StatsService } from './stats.service';

@Module({
  imports: [BuilderTradesModule],
  controllers: [StatsController],
  providers: [StatsService],
})
export class StatsModule {}
