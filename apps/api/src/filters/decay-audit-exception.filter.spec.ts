import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { DecayAuditExceptionFilter } from './decay-audit-exception.filter';
import { ConfigurationError, FetchError } from '../errors';

function createHost() {
  const json = jest.fn();
  const status = jest.fn(() => ({ json }));
  const host = new ExecutionContextHost([{}, { status }]);
  return { host, status, json };
}

describe('DecayAuditExceptionFilter', () => {
  const filter = new DecayAuditExceptionFilter();

  it('maps configuration errors to 400', () => {
    const { host, status, json } = createHost();

    filter.catch(new ConfigurationError('windowLengthDays must be greater than 0'), host);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      success: false,
      error: 'windowLengthDays must be greater than 0',
      code: 'CONFIGURATION_ERROR',
    });
  });

  it('maps fetch errors to 502', () => {
    const { host, status, json } = createHost();

    filter.catch(new FetchError('quota exceeded', 'sc-domain:example.com', 'recent'), host);

    expect(status).toHaveBeenCalledWith(502);
    expect(json).toHaveBeenCalledWith({
      success: false,
      error: 'quota exceeded',
      code: 'FETCH_ERROR',
    });
  });
});
