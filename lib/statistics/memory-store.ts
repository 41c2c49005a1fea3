import type { Milliseconds } from "@/lib/types/common";
import type {
  StatisticMetadata,
  StatisticPoint,
  StatisticsStore,
} from "./types";

/**
 * In-process statistics store, used by tests
 */
export class MemoryStatisticsStore implements StatisticsStore {
  private readonly points = new Map<string, Map<number, StatisticPoint>>();
  private readonly metadata = new Map<string, StatisticMetadata>();

  async getLastStatistic(seriesId: string): Promise<StatisticPoint | null> {
    const sorted = this.getPoints(seriesId);
    return sorted.length > 0 ? sorted[sorted.length - 1] : null;
  }

  async queryStatisticsBefore(
    seriesId: string,
    beforeMs: Milliseconds,
  ): Promise<StatisticPoint | null> {
    const earlier = this.getPoints(seriesId).filter(
      (point) => point.startMs < beforeMs,
    );
    return earlier.length > 0 ? earlier[earlier.length - 1] : null;
  }

  async appendStatistics(
    metadata: StatisticMetadata,
    points: readonly StatisticPoint[],
  ): Promise<void> {
    this.metadata.set(metadata.seriesId, metadata);
    let series = this.points.get(metadata.seriesId);
    if (!series) {
      series = new Map();
      this.points.set(metadata.seriesId, series);
    }
    for (const point of points) {
      series.set(point.startMs, { ...point });
    }
  }

  async clearStatistics(seriesIds: readonly string[]): Promise<void> {
    for (const seriesId of seriesIds) {
      this.points.delete(seriesId);
      this.metadata.delete(seriesId);
    }
  }

  async replaceStatistics(
    metadata: StatisticMetadata,
    points: readonly StatisticPoint[],
  ): Promise<void> {
    await this.clearStatistics([metadata.seriesId]);
    if (points.length > 0) {
      await this.appendStatistics(metadata, points);
    }
  }

  /** Points of a series in time order */
  getPoints(seriesId: string): StatisticPoint[] {
    const series = this.points.get(seriesId);
    if (!series) return [];
    return [...series.values()].sort((a, b) => a.startMs - b.startMs);
  }

  getMetadata(seriesId: string): StatisticMetadata | null {
    return this.metadata.get(seriesId) ?? null;
  }

  listSeries(): string[] {
    return [...this.points.keys()].sort();
  }
}
