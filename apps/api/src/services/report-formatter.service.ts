import { Injectable } from '@nestjs/common';
import {
  DecayAuditResult,
  DecayReport,
  DecayTableRow,
} from '@decay-auditor/shared-types';
import * as XLSX from 'xlsx';

const TABLE_HEADERS: ReadonlyArray<keyof DecayTableRow> = [
  'URL',
  'Current Clicks',
  'Previous Clicks',
  'Click Change',
  'Click Change %',
  'Current Impressions',
  'Previous Impressions',
  'Impression Change %',
  'Position Change',
  'Decay Score',
];

/**
 * Presentation-only view of decay reports. The engine never formats numbers.
 */
@Injectable()
export class ReportFormatterService {
  toTableRows(report: DecayReport): DecayTableRow[] {
    return report.records.map((record) => ({
      'URL': record.url,
      'Current Clicks': Math.round(record.clicksRecent),
      'Previous Clicks': Math.round(record.clicksPast),
      'Click Change': Math.round(record.clickDelta),
      'Click Change %': this.formatPercent(record.clickPctChange),
      'Current Impressions': Math.round(record.impressionsRecent),
      'Previous Impressions': Math.round(record.impressionsPast),
      'Impression Change %': this.formatPercent(record.impressionPctChange),
      'Position Change': record.positionDelta.toFixed(2),
      'Decay Score': record.decayScore.toFixed(2),
    }));
  }

  toCsv(report: DecayReport): string {
    const rows = this.toTableRows(report).map((row) =>
      TABLE_HEADERS.map((header) => row[header])
    );

    return [
      TABLE_HEADERS.join(','),
      ...rows.map((row) =>
        row.map((cell) => `"${String(cell).replace(/"/g, '""')}"`).join(',')
      ),
    ].join('\n');
  }

  /**
   * Excel workbook with a summary sheet and the decayed URLs
   */
  toWorkbook(result: DecayAuditResult): Buffer {
    const wb = XLSX.utils.book_new();
    const { windows, totals, report } = result;

    const summaryData = [
      ['Content Decay Report'],
      [],
      ['Site', result.siteUrl],
      ['Current Period', `${windows.recent.startDate} to ${windows.recent.endDate}`],
      [
        'Previous Period',
        `${windows.comparison.startDate} to ${windows.comparison.endDate}`,
      ],
      ['Generated', result.generatedAt],
      [],
      ['Summary'],
      ['Total URLs Analyzed', totals.urlsAnalyzed],
      ['Total Clicks Change', this.formatPercent(totals.clicks.changePercent)],
      ['Decayed URLs', report.summary.totalUrls],
      ['Total Clicks Lost (Decay)', report.summary.totalClicksLost],
      ['Mean Position Change', report.summary.meanPositionDelta.toFixed(2)],
      [],
      ['Minimum Click Loss', report.thresholds.minClickLoss],
      ['Minimum Decline %', report.thresholds.minPctDecline],
    ];
    XLSX.utils.book_append_sheet(
      wb,
      XLSX.utils.aoa_to_sheet(summaryData),
      'Summary'
    );

    const urlData = [
      [...TABLE_HEADERS],
      ...report.records.map((record) => [
        record.url,
        record.clicksRecent,
        record.clicksPast,
        record.clickDelta,
        record.clickPctChange,
        record.impressionsRecent,
        record.impressionsPast,
        record.impressionPctChange,
        record.positionDelta,
        record.decayScore,
      ]),
    ];
    XLSX.utils.book_append_sheet(
      wb,
      XLSX.utils.aoa_to_sheet(urlData),
      'Decayed URLs'
    );

    return XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  }

  /**
   * content_decay_<site>_<YYYYMMDD>.<extension>
   */
  exportFilename(siteUrl: string, date: Date, extension: string): string {
    const site = siteUrl.replace('sc-domain:', '').replace(/\//g, '_');
    const stamp = date.toISOString().slice(0, 10).replace(/-/g, '');
    return `content_decay_${site}_${stamp}.${extension}`;
  }

  formatPercent(value: number): string {
    return `${value.toFixed(1)}%`;
  }
}
