import { SearchConsoleService } from './search-console.service';
import { CacheService } from './cache.service';
import { FetchError } from '../errors';
import { environment } from '../environments/environment';

const mockQuery = jest.fn();
const mockSitesList = jest.fn();
const mockGetClient = jest.fn();

jest.mock('googleapis', () => ({
  google: {
    auth: {
      GoogleAuth: jest.fn().mockImplementation(() => ({
        getClient: mockGetClient,
      })),
    },
    searchconsole: jest.fn(() => ({
      searchanalytics: { query: mockQuery },
      sites: { list: mockSitesList },
    })),
  },
}));

const RANGE = { startDate: '2025-03-17', endDate: '2025-06-14' };

function apiRow(page: string, clicks: number, impressions: number, position: number) {
  return { keys: [page], clicks, impressions, ctr: clicks / impressions, position };
}

describe('SearchConsoleService', () => {
  let service: SearchConsoleService;
  const originalFilters = environment.google.pageFilters;

  beforeEach(async () => {
    jest.clearAllMocks();
    mockGetClient.mockResolvedValue({});
    environment.google.pageFilters = [];
    service = new SearchConsoleService(new CacheService());
    await service.onModuleInit();
  });

  afterAll(() => {
    environment.google.pageFilters = originalFilters;
  });

  describe('fetch', () => {
    it('maps page rows to metric rows', async () => {
      mockQuery.mockResolvedValueOnce({
        data: {
          rows: [apiRow('https://example.com/a', 10, 200, 3.5), { keys: [], clicks: 4 }],
        },
      });

      const rows = await service.fetch('sc-domain:example.com', RANGE);

      expect(rows).toEqual([
        {
          url: 'https://example.com/a',
          clicks: 10,
          impressions: 200,
          ctr: 0.05,
          position: 3.5,
        },
      ]);
      expect(mockQuery).toHaveBeenCalledWith({
        siteUrl: 'sc-domain:example.com',
        requestBody: {
          startDate: '2025-03-17',
          endDate: '2025-06-14',
          dimensions: ['page'],
          dimensionFilterGroups: undefined,
          rowLimit: 25000,
          startRow: 0,
        },
      });
    });

    it('follows pagination until a short page is returned', async () => {
      const fullPage = Array.from({ length: 25000 }, (_, i) =>
        apiRow(`/p${i}`, 1, 10, 5)
      );
      mockQuery
        .mockResolvedValueOnce({ data: { rows: fullPage } })
        .mockResolvedValueOnce({ data: { rows: [apiRow('/last', 2, 20, 8)] } });

      const rows = await service.fetch('sc-domain:example.com', RANGE);

      expect(rows).toHaveLength(25001);
      expect(mockQuery).toHaveBeenCalledTimes(2);
      expect(mockQuery.mock.calls[1][0].requestBody.startRow).toBe(25000);
    });

    it('queries each page filter and counts a page matched twice once', async () => {
      environment.google.pageFilters = ['/blog/', '/guides/'];
      service = new SearchConsoleService(new CacheService());
      await service.onModuleInit();

      mockQuery
        .mockResolvedValueOnce({
          data: {
            rows: [apiRow('/blog/guides/x', 100, 1000, 4), apiRow('/blog/y', 1, 10, 9)],
          },
        })
        .mockResolvedValueOnce({
          data: { rows: [apiRow('/blog/guides/x', 100, 1000, 4)] },
        });

      const rows = await service.fetch('sc-domain:example.com', RANGE);

      expect(rows).toEqual([
        { url: '/blog/guides/x', clicks: 100, impressions: 1000, ctr: 0.1, position: 4 },
        { url: '/blog/y', clicks: 1, impressions: 10, ctr: 0.1, position: 9 },
      ]);
      expect(mockQuery).toHaveBeenCalledTimes(2);
      expect(mockQuery.mock.calls[0][0].requestBody.dimensionFilterGroups).toEqual([
        {
          groupType: 'and',
          filters: [{ dimension: 'page', operator: 'contains', expression: '/blog/' }],
        },
      ]);
      expect(
        mockQuery.mock.calls[1][0].requestBody.dimensionFilterGroups[0].filters[0].expression
      ).toBe('/guides/');
    });

    it('serves repeated requests from the cache', async () => {
      mockQuery.mockResolvedValueOnce({ data: { rows: [apiRow('/a', 1, 10, 1)] } });

      await service.fetch('sc-domain:example.com', RANGE);
      const second = await service.fetch('sc-domain:example.com', RANGE);

      expect(second).toHaveLength(1);
      expect(mockQuery).toHaveBeenCalledTimes(1);
    });

    it('wraps API failures in a FetchError', async () => {
      mockQuery.mockRejectedValueOnce(new Error('User does not have sufficient permission'));

      await expect(
        service.fetch('sc-domain:example.com', RANGE)
      ).rejects.toMatchObject({
        name: 'FetchError',
        siteUrl: 'sc-domain:example.com',
        message: 'Search Console query failed: User does not have sufficient permission',
      });
    });

    it('fails with a FetchError before the client is initialized', async () => {
      const uninitialized = new SearchConsoleService(new CacheService());

      await expect(
        uninitialized.fetch('sc-domain:example.com', RANGE)
      ).rejects.toBeInstanceOf(FetchError);
    });
  });

  describe('listSites', () => {
    it('keeps properties the account owns or fully manages', async () => {
      mockSitesList.mockResolvedValueOnce({
        data: {
          siteEntry: [
            { siteUrl: 'sc-domain:example.com', permissionLevel: 'siteOwner' },
            { siteUrl: 'https://shop.example.com/', permissionLevel: 'siteFullUser' },
            { siteUrl: 'https://old.example.com/', permissionLevel: 'siteRestrictedUser' },
            { siteUrl: 'https://new.example.com/', permissionLevel: 'siteUnverifiedUser' },
            { permissionLevel: 'siteOwner' },
          ],
        },
      });

      await expect(service.listSites()).resolves.toEqual([
        { siteUrl: 'sc-domain:example.com', permissionLevel: 'siteOwner' },
        { siteUrl: 'https://shop.example.com/', permissionLevel: 'siteFullUser' },
      ]);
    });

    it('wraps failures in a FetchError', async () => {
      mockSitesList.mockRejectedValueOnce(new Error('invalid_grant'));

      await expect(service.listSites()).rejects.toMatchObject({
        name: 'FetchError',
        window: 'sites',
      });
    });
  });
});
