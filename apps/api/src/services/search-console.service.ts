import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { google, searchconsole_v1 } from 'googleapis';
import { CacheService } from './cache.service';
import { MetricFetchAdapter } from './metric-fetch-adapter';
import { environment } from '../environments/environment';
import { FetchError, describeError } from '../errors';
import {
  DateRange,
  MetricRow,
  MetricSet,
  SearchAnalyticsQuery,
  Site,
  SitePermissionLevel,
} from '@decay-auditor/shared-types';
import * as path from 'path';

const ACCESSIBLE_PERMISSIONS = new Set<SitePermissionLevel>([
  'siteOwner',
  'siteFullUser',
]);

const PERMISSION_LEVELS: ReadonlyArray<SitePermissionLevel> = [
  'siteOwner',
  'siteFullUser',
  'siteRestrictedUser',
  'siteUnverifiedUser',
];

function isPermissionLevel(value: string): value is SitePermissionLevel {
  return PERMISSION_LEVELS.some((level) => level === value);
}

@Injectable()
export class SearchConsoleService implements OnModuleInit, MetricFetchAdapter {
  private readonly logger = new Logger(SearchConsoleService.name);
  private searchConsole?: searchconsole_v1.Searchconsole;
  private readonly pageFilters: string[];
  private readonly rowLimit: number;

  constructor(private readonly cacheService: CacheService) {
    this.pageFilters = environment.google.pageFilters;
    this.rowLimit = environment.google.rowLimit;
  }

  async onModuleInit() {
    await this.initializeClient();
  }

  /**
   * Initialize Google Search Console API client
   */
  private async initializeClient(): Promise<void> {
    try {
      const credentialsPath = path.resolve(
        process.cwd(),
        environment.google.credentialsPath
      );

      this.logger.log(`Loading credentials from: ${credentialsPath}`);

      const auth = new google.auth.GoogleAuth({
        keyFile: credentialsPath,
        scopes: ['https://www.googleapis.com/auth/webmasters.readonly'],
      });

      // Fail at startup rather than on the first audit
      await auth.getClient();
      this.searchConsole = google.searchconsole({ version: 'v1', auth });

      this.logger.log('Google Search Console client initialized successfully');
    } catch (error) {
      this.logger.error('Failed to initialize Search Console client:', error);
      throw error;
    }
  }

  /**
   * Per-page metrics for one property and date range
   */
  async fetch(siteUrl: string, dateRange: DateRange): Promise<MetricSet> {
    const query: SearchAnalyticsQuery = {
      startDate: dateRange.startDate,
      endDate: dateRange.endDate,
      dimensions: ['page'],
      rowLimit: this.rowLimit,
    };
    const cacheKey = `pages:${siteUrl}:${query.startDate}:${query.endDate}`;

    return this.cacheService.getOrSet(
      cacheKey,
      async () => {
        const allRows: MetricRow[] = [];

        try {
          if (this.pageFilters.length === 0) {
            allRows.push(...(await this.fetchWithPagination(siteUrl, query)));
          }
          for (const pageFilter of this.pageFilters) {
            allRows.push(
              ...(await this.fetchWithPagination(siteUrl, query, pageFilter))
            );
          }
        } catch (error) {
          if (error instanceof FetchError) throw error;
          throw new FetchError(
            `Search Console query failed: ${describeError(error)}`,
            siteUrl,
            undefined,
            { cause: error }
          );
        }

        const rows = this.dedupeByUrl(allRows);
        this.logger.log(
          `Fetched ${rows.length} pages for ${siteUrl} (${query.startDate} to ${query.endDate})`
        );
        return rows;
      },
      environment.cache.analyticsTtl
    );
  }

  /**
   * Properties the service account can read analytics for
   */
  async listSites(): Promise<Site[]> {
    return this.cacheService.getOrSet(
      'sites:list',
      async () => {
        try {
          const response = await this.getClient().sites.list();
          const sites: Site[] = [];

          for (const entry of response.data.siteEntry || []) {
            const siteUrl = entry.siteUrl;
            const permissionLevel = entry.permissionLevel;
            if (!siteUrl || !permissionLevel) continue;
            if (!isPermissionLevel(permissionLevel)) continue;
            if (!ACCESSIBLE_PERMISSIONS.has(permissionLevel)) continue;
            sites.push({ siteUrl, permissionLevel });
          }

          return sites;
        } catch (error) {
          if (error instanceof FetchError) throw error;
          throw new FetchError(
            `Listing Search Console sites failed: ${describeError(error)}`,
            '',
            'sites',
            { cause: error }
          );
        }
      },
      environment.cache.sitesTtl
    );
  }

  /**
   * Fetch data with pagination support
   */
  private async fetchWithPagination(
    siteUrl: string,
    query: SearchAnalyticsQuery,
    pageFilter?: string
  ): Promise<MetricRow[]> {
    const client = this.getClient(siteUrl);
    const pageSize = Math.min(query.rowLimit || this.rowLimit, this.rowLimit);
    const allRows: MetricRow[] = [];
    let startRow = 0;

    while (true) {
      const response = await client.searchanalytics.query({
        siteUrl,
        requestBody: {
          startDate: query.startDate,
          endDate: query.endDate,
          dimensions: query.dimensions || ['page'],
          dimensionFilterGroups: pageFilter
            ? [
                {
                  groupType: 'and',
                  filters: [
                    {
                      dimension: 'page',
                      operator: 'contains',
                      expression: pageFilter,
                    },
                  ],
                },
              ]
            : undefined,
          rowLimit: pageSize,
          startRow,
        },
      });

      const rows = response.data.rows || [];
      if (rows.length === 0) break;

      for (const row of rows) {
        const url = row.keys?.[0];
        if (!url) continue;
        allRows.push({
          url,
          clicks: row.clicks || 0,
          impressions: row.impressions || 0,
          ctr: row.ctr || 0,
          position: row.position || 0,
        });
      }

      if (rows.length < pageSize) break;
      startRow += pageSize;
    }

    return allRows;
  }

  /**
   * A page matched by several filters comes back once per filter with the
   * same totals for the range, so only its first row is kept.
   */
  private dedupeByUrl(rows: MetricRow[]): MetricRow[] {
    const pageMap = new Map<string, MetricRow>();

    for (const row of rows) {
      if (!pageMap.has(row.url)) {
        pageMap.set(row.url, row);
      }
    }

    return Array.from(pageMap.values());
  }

  private getClient(siteUrl = ''): searchconsole_v1.Searchconsole {
    if (!this.searchConsole) {
      throw new FetchError('Search Console client is not initialized', siteUrl);
    }
    return this.searchConsole;
  }
}
