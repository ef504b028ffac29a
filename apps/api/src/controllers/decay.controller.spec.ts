import { Test } from '@nestjs/testing';
import { DateRange, MetricSet } from '@decay-auditor/shared-types';
import { DecayController } from './decay.controller';
import {
  DateWindowService,
  DecayAuditService,
  DecayEngineService,
  METRIC_FETCH_ADAPTER,
  MetricFetchAdapter,
  ReportFormatterService,
} from '../services';
import { ConfigurationError } from '../errors';
import { environment } from '../environments/environment';

const metrics: Record<string, MetricSet> = {
  '2025-03-17': [{ url: '/guide', clicks: 30, impressions: 900, ctr: 0.033, position: 7 }],
  '2024-03-17': [{ url: '/guide', clicks: 120, impressions: 1500, ctr: 0.08, position: 4 }],
};

const adapter: MetricFetchAdapter = {
  fetch: async (_siteUrl: string, range: DateRange) => metrics[range.startDate] ?? [],
};

describe('DecayController', () => {
  let controller: DecayController;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [DecayController],
      providers: [
        DateWindowService,
        DecayEngineService,
        DecayAuditService,
        ReportFormatterService,
        { provide: METRIC_FETCH_ADAPTER, useValue: adapter },
      ],
    }).compile();

    controller = moduleRef.get(DecayController);
  });

  describe('getWindows', () => {
    it('returns both periods for the given day', () => {
      expect(controller.getWindows('2025-06-15')).toEqual({
        success: true,
        data: {
          recent: { startDate: '2025-03-17', endDate: '2025-06-14' },
          comparison: { startDate: '2024-03-17', endDate: '2024-06-14' },
        },
      });
    });

    it('rejects a malformed date', () => {
      expect(() => controller.getWindows('June 15')).toThrow(ConfigurationError);
    });
  });

  describe('audit', () => {
    it('returns the report with display rows', async () => {
      const response = await controller.audit({
        siteUrl: 'sc-domain:example.com',
        today: '2025-06-15',
        minClickLoss: '50',
      });

      expect(response).toMatchObject({
        success: true,
        data: {
          report: {
            records: [{ url: '/guide', clickDelta: -90, clickPctChange: -75 }],
            thresholds: { minClickLoss: 50, minPctDecline: 20 },
          },
          table: [{ 'URL': '/guide', 'Click Change %': '-75.0%' }],
        },
      });
    });

    it('requires a site when none is configured', async () => {
      const original = environment.google.siteUrl;
      environment.google.siteUrl = '';
      try {
        await expect(controller.audit({ today: '2025-06-15' })).rejects.toThrow(
          new ConfigurationError('Missing required parameter: siteUrl')
        );
      } finally {
        environment.google.siteUrl = original;
      }
    });

    it('rejects non-numeric thresholds', async () => {
      await expect(
        controller.audit({ siteUrl: 'sc-domain:example.com', minPctDecline: 'lots' })
      ).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});
