import { DecayAuditRequest } from '@decay-auditor/shared-types';
import { ConfigurationError } from '../errors';
import { DateWindowService } from '../services/date-window.service';
import { environment } from '../environments/environment';

/**
 * Raw query-string parameters accepted by audit and export endpoints
 */
export type AuditQueryParams = {
  siteUrl?: string;
  today?: string;
  minClickLoss?: string;
  minPctDecline?: string;
  allowPartial?: string;
};

export function parseNumberParam(
  name: string,
  value?: string
): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Same truthy spellings as `readBoolean` in the environment
 */
export function parseBooleanParam(value?: string): boolean | undefined {
  const raw = value?.trim().toLowerCase();
  if (!raw) return undefined;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

/**
 * Build an audit request, falling back to the configured default site
 */
export function toAuditRequest(params: AuditQueryParams): DecayAuditRequest {
  const siteUrl = params.siteUrl?.trim() || environment.google.siteUrl;
  if (!siteUrl) {
    throw new ConfigurationError('Missing required parameter: siteUrl');
  }

  return {
    siteUrl,
    today: params.today ? DateWindowService.parseDate(params.today) : undefined,
    thresholds: {
      minClickLoss: parseNumberParam('minClickLoss', params.minClickLoss),
      minPctDecline: parseNumberParam('minPctDecline', params.minPctDecline),
    },
    allowPartialResults: parseBooleanParam(params.allowPartial),
  };
}
