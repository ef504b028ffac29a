import { Controller, Delete, Get, Logger, Query } from '@nestjs/common';
import { CacheService } from '../services/cache.service';
import { SearchConsoleService } from '../services/search-console.service';

@Controller('sites')
export class SitesController {
  private readonly logger = new Logger(SitesController.name);

  constructor(
    private readonly searchConsoleService: SearchConsoleService,
    private readonly cacheService: CacheService
  ) {}

  /**
   * GET /api/sites
   * Verified properties the service account owns or fully manages
   */
  @Get()
  async listSites() {
    const sites = await this.searchConsoleService.listSites();

    return {
      success: true,
      data: sites,
      meta: {
        count: sites.length,
      },
    };
  }

  /**
   * DELETE /api/sites/cache
   * Drop cached metrics for one site (?siteUrl=) or for everything
   */
  @Delete('cache')
  clearCache(@Query('siteUrl') siteUrl?: string) {
    if (siteUrl) {
      const removed = this.cacheService.invalidateSite(siteUrl);
      this.logger.log(`Removed ${removed} cached entries for ${siteUrl}`);
      return { success: true, data: { removed } };
    }

    this.cacheService.flush();
    return { success: true, data: { removed: 'all' } };
  }
}
