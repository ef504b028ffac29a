import { Module } from '@nestjs/common';

// Services
import {
  CacheService,
  DateWindowService,
  DecayAuditService,
  DecayEngineService,
  METRIC_FETCH_ADAPTER,
  ReportFormatterService,
  SearchConsoleService,
} from '../services';

// Controllers
import {
  DecayController,
  ExportController,
  SitesController,
} from '../controllers';

@Module({
  imports: [],
  controllers: [DecayController, ExportController, SitesController],
  providers: [
    CacheService,
    SearchConsoleService,
    { provide: METRIC_FETCH_ADAPTER, useExisting: SearchConsoleService },
    DateWindowService,
    DecayEngineService,
    DecayAuditService,
    ReportFormatterService,
  ],
})
export class AppModule {}
