import { roundTo } from "@/lib/gpa/aggregate";
import type { PercentileMethod } from "@/lib/gpa/config";
import type { RankedRecord, StudentGpaRecord } from "@/lib/gpa/types";

export type RankOptions = {
  percentileMethod: PercentileMethod;
  percentileDecimals: number;
};

/**
 * spread: top rank 100, bottom rank 0, a single student 100.
 * cohort: share of the cohort at or below the student, 100 * (N - rank + 1) / N.
 */
export function percentileFor(rank: number, cohortSize: number, method: PercentileMethod): number {
  if (cohortSize <= 0) return 0;
  if (method === "cohort") return (100 * (cohortSize - rank + 1)) / cohortSize;
  if (cohortSize === 1) return 100;
  return (100 * (cohortSize - rank)) / (cohortSize - 1);
}

/**
 * Standard competition ranking by GPA, highest first: equal GPAs share a
 * rank and the next GPA down skips ahead (1, 1, 3). Students without a GPA
 * follow, unranked, in batch order.
 */
export function rankRecords(records: StudentGpaRecord[], options: RankOptions): RankedRecord[] {
  const rankable: Array<StudentGpaRecord & { gpa: number }> = [];
  const unrankable: StudentGpaRecord[] = [];
  for (const record of records) {
    const { gpa } = record;
    if (gpa === null) unrankable.push(record);
    else rankable.push({ ...record, gpa });
  }

  rankable.sort((a, b) => b.gpa - a.gpa || a.order - b.order);

  const n = rankable.length;
  const ranked: RankedRecord[] = [];
  let rank = 0;
  rankable.forEach((record, i) => {
    if (i === 0 || record.gpa !== rankable[i - 1].gpa) rank = i + 1;
    ranked.push({
      ...record,
      unranked: false,
      rank,
      percentile: roundTo(percentileFor(rank, n, options.percentileMethod), options.percentileDecimals),
    });
  });

  const tail = [...unrankable]
    .sort((a, b) => a.order - b.order)
    .map((record): RankedRecord => ({ ...record, unranked: true, rank: null, percentile: null }));

  return [...ranked, ...tail];
}
