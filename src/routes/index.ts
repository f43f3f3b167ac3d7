/**
 * ルートインデックス
 */

export { createHealthRouter, HealthRouteOptions } from "./health";
export { createOptimizerRouter, OptimizerRouteDeps } from "./optimizer";
export { createABTestRouter, ABTestRouteDeps } from "./ab-test";
export { createCronRouter, CronRouteDeps } from "./cron";
export { sendError, sendSuccess, sendValidationErrors } from "./respond";
