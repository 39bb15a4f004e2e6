import type { DerivedMetrics, HeuristicThresholds } from "lib/report/types.js";

import { CONCLUSION_MESSAGES, DEFAULT_THRESHOLDS } from "../constants.js";

interface HeuristicRule {
  message: string;
  fires: (metrics: DerivedMetrics, thresholds: HeuristicThresholds) => boolean;
}

const RULES: HeuristicRule[] = [
  {
    message: CONCLUSION_MESSAGES.lowIpc,
    fires: ({ ipc }, { ipcBelow }) => ipc !== null && ipc < ipcBelow
  },
  {
    message: CONCLUSION_MESSAGES.branchMisses,
    fires: ({ branchMissRate }, { branchMissRateAbove }) =>
      branchMissRate !== null && branchMissRate > branchMissRateAbove
  },
  {
    message: CONCLUSION_MESSAGES.l1dMpki,
    fires: ({ l1dMpki }, { l1dMpkiAbove }) => l1dMpki !== null && l1dMpki > l1dMpkiAbove
  },
  {
    message: CONCLUSION_MESSAGES.llcMpki,
    fires: ({ llcMpki }, { llcMpkiAbove }) => llcMpki !== null && llcMpki > llcMpkiAbove
  }
];

/**
 * Rules are independent; every rule that fires contributes its message, in
 * rule order. Rules with unavailable inputs are skipped.
 */
export function deriveConclusions(
  metrics: DerivedMetrics,
  thresholds: HeuristicThresholds = DEFAULT_THRESHOLDS
): string[] {
  const conclusions = RULES.filter((rule) => rule.fires(metrics, thresholds)).map((rule) => rule.message);
  return conclusions.length > 0 ? conclusions : [CONCLUSION_MESSAGES.fallback];
}
