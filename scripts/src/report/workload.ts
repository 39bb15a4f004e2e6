import type { WorkloadParams } from "lib/report/types.js";

import { DEFAULT_WORKLOAD } from "../constants.js";

export function resolveWorkloadLines({ workload, ops, trade }: WorkloadParams): string[] {
  if (workload) {
    return workload
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  return [
    `add/delete split evenly, trade share ${trade}%`,
    `Operations per iteration: ${ops}`,
    `Warm-up orders: ${DEFAULT_WORKLOAD.warmupOrders}, max active orders: ${DEFAULT_WORKLOAD.maxActiveOrders}, price levels: ${DEFAULT_WORKLOAD.priceLevels}`
  ];
}
