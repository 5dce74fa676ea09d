/**
 * Prometheus telemetry entry point.
 *
 * @example
 * import { createPrometheusTelemetry } from '@rigsnap/core/prometheus';
 * import { setTelemetry } from '@rigsnap/core';
 *
 * setTelemetry(createPrometheusTelemetry());
 */

export {
  createPrometheusTelemetry,
  type PrometheusTelemetryOptions,
  type PrometheusTelemetryFacade,
} from './telemetry-prometheus.js';
