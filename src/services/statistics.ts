import { roundTo } from '../state/scoring';
import { WASTE_TYPES, type WasteRecord, type WasteStatus, type WasteType } from '../state/types';

const TOP_CONTRIBUTORS = 5;

export type StatisticsPeriod = {
  /** Inclusive */
  start: Date;
  /** Exclusive */
  end: Date;
};

export type ContributorTotal = {
  ownerId: string;
  totalKg: number;
};

export type WastePeriodSummary = {
  periodStart: string;
  periodEnd: string;
  totalRecords: number;
  totalWasteKg: number;
  totalUsers: number;
  kgByType: Record<WasteType, number>;
  countByStatus: Record<WasteStatus, number>;
  recycledPercentage: number;
  totalPoints: number;
  totalEnvironmentalScore: number;
  topContributors: ContributorTotal[];
};

function emptyTypeTotals(): Record<WasteType, number> {
  return { organic: 0, plastic: 0, paper: 0, glass: 0, metal: 0, electronic: 0, hazardous: 0, textile: 0, other: 0 };
}

function emptyStatusCounts(): Record<WasteStatus, number> {
  return { pending: 0, collected: 0, processed: 0, recycled: 0, disposed: 0, rejected: 0 };
}

/**
 * Summarize the records created within `period`. Pure: the same records and
 * period always give the same summary.
 */
export function summarizeWastePeriod(records: readonly WasteRecord[], period: StatisticsPeriod): WastePeriodSummary {
  const from = period.start.getTime();
  const to = period.end.getTime();
  const inPeriod = records.filter((r) => {
    const created = Date.parse(r.createdAt);
    return created >= from && created < to;
  });

  const kgByType = emptyTypeTotals();
  const countByStatus = emptyStatusCounts();
  const kgByOwner = new Map<string, number>();
  let totalKg = 0;
  let recycledKg = 0;
  let totalPoints = 0;
  let totalScore = 0;

  for (const r of inPeriod) {
    totalKg += r.quantity;
    kgByType[r.wasteType] += r.quantity;
    countByStatus[r.status] += 1;
    kgByOwner.set(r.ownerId, (kgByOwner.get(r.ownerId) ?? 0) + r.quantity);
    if (r.status === 'recycled') recycledKg += r.quantity;
    totalPoints += r.pointsAwarded;
    totalScore += r.environmentalScore;
  }

  const topContributors = Array.from(kgByOwner, ([ownerId, kg]) => ({ ownerId, totalKg: roundTo(kg, 2) }))
    .sort((a, b) => b.totalKg - a.totalKg || a.ownerId.localeCompare(b.ownerId))
    .slice(0, TOP_CONTRIBUTORS);

  for (const t of WASTE_TYPES) kgByType[t] = roundTo(kgByType[t], 2);

  return {
    periodStart: period.start.toISOString(),
    periodEnd: period.end.toISOString(),
    totalRecords: inPeriod.length,
    totalWasteKg: roundTo(totalKg, 2),
    totalUsers: kgByOwner.size,
    kgByType,
    countByStatus,
    recycledPercentage: totalKg > 0 ? roundTo((recycledKg / totalKg) * 100, 2) : 0,
    totalPoints,
    totalEnvironmentalScore: roundTo(totalScore, 2),
    topContributors,
  };
}
