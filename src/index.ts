/**
 * Momentum FC Backend
 * 
 * Lambda entry points: `handler` serves the HTTP API, `pollHandler` runs one
 * poll cycle per scheduled invocation and `migrationHandler` creates the schema.
 */

export { handler } from './handlers/api-handler';
export { handler as pollHandler } from './handlers/poll-handler';
export { handler as migrationHandler } from './handlers/migration-handler';

export * from './config/environment';
export { estimateMinute } from './utils/minute-estimator';
export { calculatePressureIndex } from './utils/pressure-calculation';
export { calculateForecast } from './utils/forecast-calculation';
export { renderPressureChart, renderSparkline } from './utils/chart-rendering';
