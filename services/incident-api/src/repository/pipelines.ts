import type { PipelineStage } from "mongoose";

export interface SummaryAggregate {
  _id: null;
  totalDetections: number;
  totalAlerts: number;
  avgConfidence: number | null;
}

export interface GroupCount<K> {
  _id: K;
  count: number;
}

export function summaryPipeline(alertTypes: readonly string[]): PipelineStage[] {
  return [
    {
      $group: {
        _id: null,
        totalDetections: { $sum: 1 },
        avgConfidence: { $avg: "$confidence" },
        totalAlerts: {
          $sum: { $cond: [{ $in: ["$detection_type", [...alertTypes]] }, 1, 0] },
        },
      },
    },
  ];
}

export function detectionTypePipeline(): PipelineStage[] {
  return [{ $group: { _id: "$detection_type", count: { $sum: 1 } } }];
}

export function hourlyPipeline(timeZone: string): PipelineStage[] {
  return [
    { $group: { _id: { $hour: { date: "$timestamp", timezone: timeZone } }, count: { $sum: 1 } } },
    { $sort: { _id: 1 } },
  ];
}

export function locationPipeline(): PipelineStage[] {
  return [
    { $group: { _id: "$location_id", count: { $sum: 1 } } },
    { $sort: { count: -1, _id: 1 } },
  ];
}
