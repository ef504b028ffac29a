import { Injectable } from '@nestjs/common';
import {
  AuditWindows,
  DateRange,
  DateWindowConfig,
} from '@decay-auditor/shared-types';
import { ConfigurationError } from '../errors';
import { environment } from '../environments/environment';
import { withDefaults } from '../utils/defaults';

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

@Injectable()
export class DateWindowService {
  /**
   * Recent window ending `reportLagDays` before today, and the same window
   * shifted back by `yoyOffsetDays`. Dates are UTC calendar days.
   */
  calculate(
    today: Date = new Date(),
    overrides: Partial<DateWindowConfig> = {}
  ): AuditWindows {
    const config = withDefaults<DateWindowConfig>(
      environment.dateWindows,
      overrides
    );
    DateWindowService.validate(config);

    if (Number.isNaN(today.getTime())) {
      throw new ConfigurationError('Invalid reference date');
    }

    const day = DateWindowService.startOfUtcDay(today);
    const recentEnd = DateWindowService.addDays(day, -config.reportLagDays);
    const recentStart = DateWindowService.addDays(
      recentEnd,
      -(config.windowLengthDays - 1)
    );

    const comparisonStart = DateWindowService.addDays(
      recentStart,
      -config.yoyOffsetDays
    );
    const comparisonEnd = DateWindowService.addDays(
      recentEnd,
      -config.yoyOffsetDays + config.comparisonLagAdjustmentDays
    );

    return {
      recent: DateWindowService.toRange(recentStart, recentEnd),
      comparison: DateWindowService.toRange(comparisonStart, comparisonEnd),
    };
  }

  /**
   * Reject configurations that produce empty or overlapping windows
   */
  static validate(config: DateWindowConfig): void {
    for (const [key, value] of Object.entries(config)) {
      if (!Number.isInteger(value)) {
        throw new ConfigurationError(`${key} must be a whole number of days`);
      }
    }

    if (config.reportLagDays < 0) {
      throw new ConfigurationError('reportLagDays must not be negative');
    }
    if (config.windowLengthDays <= 0) {
      throw new ConfigurationError('windowLengthDays must be greater than 0');
    }
    if (config.yoyOffsetDays < config.windowLengthDays) {
      throw new ConfigurationError(
        `yoyOffsetDays (${config.yoyOffsetDays}) must be at least windowLengthDays ` +
          `(${config.windowLengthDays}), otherwise the windows overlap`
      );
    }
    if (config.comparisonLagAdjustmentDays < 0) {
      throw new ConfigurationError(
        'comparisonLagAdjustmentDays must not be negative'
      );
    }
    if (
      config.yoyOffsetDays - config.comparisonLagAdjustmentDays <
      config.windowLengthDays
    ) {
      throw new ConfigurationError(
        'comparisonLagAdjustmentDays pushes the comparison window into the recent window'
      );
    }
  }

  /**
   * Parse a YYYY-MM-DD string as a UTC date
   */
  static parseDate(value: string): Date {
    const match = ISO_DATE.exec(value.trim());
    if (!match) {
      throw new ConfigurationError(`Invalid date "${value}", expected YYYY-MM-DD`);
    }

    const [, year, month, day] = match;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    // Date.UTC rolls 2025-02-30 over into March
    if (DateWindowService.formatDate(date) !== value.trim()) {
      throw new ConfigurationError(`Invalid date "${value}"`);
    }
    return date;
  }

  static formatDate(date: Date): string {
    return date.toISOString().split('T')[0];
  }

  private static startOfUtcDay(date: Date): Date {
    return new Date(
      Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
    );
  }

  private static addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * DAY_MS);
  }

  private static toRange(start: Date, end: Date): DateRange {
    return {
      startDate: DateWindowService.formatDate(start),
      endDate: DateWindowService.formatDate(end),
    };
  }
}
