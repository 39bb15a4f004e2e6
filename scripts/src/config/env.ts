import { DEFAULT_REPORT_TITLE, REPORT_ENV_VARIABLES } from "../constants.js";

export interface ReportRuntimeConfig {
  title: string;
  thresholdsPath: string | null;
}

function nonEmpty(value: string | undefined): string | null {
  return value && value.trim().length > 0 ? value : null;
}

export function resolveReportRuntimeConfig(env: NodeJS.ProcessEnv = process.env): ReportRuntimeConfig {
  return {
    title: nonEmpty(env[REPORT_ENV_VARIABLES.title]) ?? DEFAULT_REPORT_TITLE,
    thresholdsPath: nonEmpty(env[REPORT_ENV_VARIABLES.thresholdsPath])
  };
}
