/**
 * @article2video/cli
 *
 * Command surface and HTTP transport over `@article2video/core`.
 */

export { cmdRun, describeRun } from './commands/run.js';
export { cmdServe } from './commands/serve.js';
export { cmdDoctor, collectDoctorReport, type DoctorReport, type ToolProbe } from './commands/doctor.js';
export { routeRequest, type RouteDeps, type RouteResult, type RunPipeline } from './server/routes.js';
export { createHttpServer, listen } from './server/http.js';
export { ClackLogger } from './ui/logger.js';
export { arg, hasFlag, intFlag } from './utils/args.js';
export { UsageError } from './utils/errors.js';
