/**
 * Widget service: cached records -> XP total -> level progress.
 * One process-wide instance is built lazily from the environment config.
 */

import { getEnvConfig } from '@/core/env';
import { RecordCache } from '@/lib/cache/recordCache';
import { levelProgress, type LevelProgress } from '@/progress/level';
import { sumNumericProperty } from '@/progress/xp';
import { NotionClient } from '@/providers/notion/client';
import type { NotionPage } from '@/providers/notion/types';
import type { WidgetView } from './render';

export interface WidgetSettings {
  pointsPerLevel: number;
  cacheTtlSeconds: number;
  xpProperty: string;
  widgetTitle: string;
}

export interface WidgetSnapshot extends LevelProgress {
  pointsPerLevel: number;
  recordCount: number;
  capturedAt: number;
}

export interface ComputeOptions {
  forceRefresh?: boolean;
}

export class WidgetService {
  constructor(
    private readonly cache: RecordCache<NotionPage>,
    private readonly settings: WidgetSettings
  ) {}

  async compute(options: ComputeOptions = {}): Promise<WidgetSnapshot> {
    const { pointsPerLevel, cacheTtlSeconds, xpProperty } = this.settings;
    const { records, capturedAt } = await this.cache.getSnapshot(cacheTtlSeconds, {
      forceRefresh: options.forceRefresh,
    });
    const total = sumNumericProperty(records, xpProperty);

    return {
      ...levelProgress(total, pointsPerLevel),
      pointsPerLevel,
      recordCount: records.length,
      capturedAt,
    };
  }

  toView(snapshot: WidgetSnapshot): WidgetView {
    return {
      title: this.settings.widgetTitle,
      total: snapshot.total,
      level: snapshot.level,
      progressPct: snapshot.progressPct,
      pointsPerLevel: snapshot.pointsPerLevel,
    };
  }
}

let defaultService: WidgetService | null = null;

export function getWidgetService(): WidgetService {
  if (!defaultService) {
    const config = getEnvConfig();
    const client = new NotionClient({ token: config.apiToken, databaseId: config.databaseId });
    const cache = new RecordCache<NotionPage>({ fetchRecords: () => client.fetchAllRecords() });
    defaultService = new WidgetService(cache, config);
  }
  return defaultService;
}

export function resetWidgetService(): void {
  defaultService = null;
}
