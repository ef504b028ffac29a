import { parseBooleanParam, parseNumberParam, toAuditRequest } from './audit-query';
import { ConfigurationError } from '../errors';
import { environment } from '../environments/environment';

describe('audit query parsing', () => {
  it('parses numbers and leaves blanks undefined', () => {
    expect(parseNumberParam('minClickLoss', '25')).toBe(25);
    expect(parseNumberParam('minClickLoss', '12.5')).toBe(12.5);
    expect(parseNumberParam('minClickLoss', '')).toBeUndefined();
    expect(parseNumberParam('minClickLoss')).toBeUndefined();
    expect(() => parseNumberParam('minClickLoss', 'ten')).toThrow(
      'minClickLoss must be a number, got "ten"'
    );
  });

  it('parses booleans', () => {
    expect(parseBooleanParam('true')).toBe(true);
    expect(parseBooleanParam('1')).toBe(true);
    expect(parseBooleanParam('yes')).toBe(true);
    expect(parseBooleanParam(' TRUE ')).toBe(true);
    expect(parseBooleanParam('false')).toBe(false);
    expect(parseBooleanParam('no')).toBe(false);
    expect(parseBooleanParam('  ')).toBeUndefined();
    expect(parseBooleanParam(undefined)).toBeUndefined();
  });

  it('builds an audit request', () => {
    expect(
      toAuditRequest({
        siteUrl: ' https://example.com/ ',
        today: '2025-06-15',
        minPctDecline: '30',
        allowPartial: 'true',
      })
    ).toEqual({
      siteUrl: 'https://example.com/',
      today: new Date('2025-06-15T00:00:00Z'),
      thresholds: { minClickLoss: undefined, minPctDecline: 30 },
      allowPartialResults: true,
    });
  });

  it('falls back to the configured site', () => {
    const original = environment.google.siteUrl;
    environment.google.siteUrl = 'sc-domain:default.example';
    try {
      expect(toAuditRequest({}).siteUrl).toBe('sc-domain:default.example');
    } finally {
      environment.google.siteUrl = original;
    }
  });

  it('rejects a request without any site', () => {
    const original = environment.google.siteUrl;
    environment.google.siteUrl = '';
    try {
      expect(() => toAuditRequest({ siteUrl: '   ' })).toThrow(
        new ConfigurationError('Missing required parameter: siteUrl')
      );
    } finally {
      environment.google.siteUrl = original;
    }
  });

  it('rejects an invalid reference date', () => {
    expect(() => toAuditRequest({ siteUrl: 'a', today: '2025-02-30' })).toThrow(
      ConfigurationError
    );
  });
});
