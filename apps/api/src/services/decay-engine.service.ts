import { Injectable } from '@nestjs/common';
import {
  DecayRecord,
  DecayReport,
  DecayScoreWeights,
  DecayThresholds,
  MetricRow,
  MetricSet,
  SiteTotals,
} from '@decay-auditor/shared-types';
import { ConfigurationError } from '../errors';
import { environment } from '../environments/environment';
import { withDefaults } from '../utils/defaults';

const EMPTY_METRICS: Omit<MetricRow, 'url'> = {
  clicks: 0,
  impressions: 0,
  ctr: 0,
  position: 0,
};

@Injectable()
export class DecayEngineService {
  /**
   * Outer join of both windows by URL, one record per URL, ordered by URL.
   * A URL missing from one side gets zero metrics for that side.
   */
  join(
    recent: MetricSet,
    past: MetricSet,
    weights: Partial<DecayScoreWeights> = {}
  ): DecayRecord[] {
    const resolvedWeights = this.resolveWeights(weights);

    const recentMap = new Map<string, MetricRow>();
    const pastMap = new Map<string, MetricRow>();

    for (const row of recent) {
      recentMap.set(row.url, row);
    }
    for (const row of past) {
      pastMap.set(row.url, row);
    }

    const allUrls = [...new Set([...recentMap.keys(), ...pastMap.keys()])].sort(
      compareUrls
    );

    return allUrls.map((url) => {
      const current = recentMap.get(url);
      const previous = pastMap.get(url);
      return this.buildRecord(
        url,
        current ?? EMPTY_METRICS,
        previous ?? EMPTY_METRICS,
        !previous,
        !current,
        resolvedWeights
      );
    });
  }

  /**
   * Keep records that lost at least `minClickLoss` clicks and `minPctDecline`
   * percent against a non-zero baseline, ranked by decay score.
   */
  filterAndRank(
    records: ReadonlyArray<DecayRecord>,
    thresholds: Partial<DecayThresholds> = {}
  ): DecayReport {
    const resolved = this.resolveThresholds(thresholds);

    const retained = records
      .filter(
        (r) =>
          r.clicksPast > 0 &&
          r.clickDelta <= -resolved.minClickLoss &&
          // Cross-multiplied so a decline exactly on the threshold is kept
          r.clickDelta * 100 <= -resolved.minPctDecline * r.clicksPast
      )
      .sort(
        (a, b) =>
          b.decayScore - a.decayScore ||
          a.clickDelta - b.clickDelta ||
          compareUrls(a.url, b.url)
      )
      .map((r) => Object.freeze({ ...r }));

    const totalClicksLost = retained.reduce((sum, r) => sum + r.clickDelta, 0);
    const meanPositionDelta =
      retained.length > 0
        ? retained.reduce((sum, r) => sum + r.positionDelta, 0) / retained.length
        : 0;

    return Object.freeze({
      records: Object.freeze(retained),
      summary: Object.freeze({
        totalUrls: retained.length,
        totalClicksLost,
        meanPositionDelta,
      }),
      thresholds: Object.freeze(resolved),
    });
  }

  /**
   * Site-wide click totals across every joined URL
   */
  summarize(records: ReadonlyArray<DecayRecord>): SiteTotals {
    let recentClicks = 0;
    let pastClicks = 0;
    let newUrls = 0;
    let goneUrls = 0;

    for (const record of records) {
      recentClicks += record.clicksRecent;
      pastClicks += record.clicksPast;
      if (record.isNew) newUrls++;
      if (record.isGone) goneUrls++;
    }

    return {
      urlsAnalyzed: records.length,
      newUrls,
      goneUrls,
      clicks: {
        recent: recentClicks,
        past: pastClicks,
        change: recentClicks - pastClicks,
        changePercent: this.calculatePercentChange(pastClicks, recentClicks),
      },
    };
  }

  /**
   * Percent change against a baseline. A zero baseline yields exactly 0 rather
   * than dividing by a substituted 1.
   */
  calculatePercentChange(previous: number, current: number): number {
    if (previous === 0) {
      return 0;
    }
    return ((current - previous) / previous) * 100;
  }

  resolveWeights(weights: Partial<DecayScoreWeights> = {}): DecayScoreWeights {
    const resolved = withDefaults(environment.decay.weights, weights);
    for (const [key, value] of Object.entries(resolved)) {
      if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${key} must be a finite number`);
      }
    }
    return resolved;
  }

  resolveThresholds(thresholds: Partial<DecayThresholds> = {}): DecayThresholds {
    const resolved = withDefaults(environment.decay.thresholds, thresholds);
    for (const [key, value] of Object.entries(resolved)) {
      if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(`${key} must be a non-negative number`);
      }
    }
    return resolved;
  }

  private buildRecord(
    url: string,
    current: Omit<MetricRow, 'url'>,
    previous: Omit<MetricRow, 'url'>,
    isNew: boolean,
    isGone: boolean,
    weights: DecayScoreWeights
  ): DecayRecord {
    const clickDelta = current.clicks - previous.clicks;
    // Position 0 stands for "no data" on a missing side and is kept as-is
    const positionDelta = current.position - previous.position;

    return {
      url,
      clicksRecent: current.clicks,
      clicksPast: previous.clicks,
      impressionsRecent: current.impressions,
      impressionsPast: previous.impressions,
      positionRecent: current.position,
      positionPast: previous.position,
      clickDelta,
      clickPctChange: this.calculatePercentChange(previous.clicks, current.clicks),
      impressionDelta: current.impressions - previous.impressions,
      impressionPctChange: this.calculatePercentChange(
        previous.impressions,
        current.impressions
      ),
      positionDelta,
      decayScore:
        Math.abs(clickDelta) * weights.clickWeight +
        positionDelta * weights.positionWeight,
      isNew,
      isGone,
    };
  }
}

function compareUrls(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
