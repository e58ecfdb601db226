/**
 * OpenTelemetry preload. Loaded before the app with `node --import ./src/otel/register.ts` so
 * auto-instrumentation can patch pg, ioredis, http and fastify before they are imported.
 *
 * Without OTEL_EXPORTER_OTLP_ENDPOINT nothing is registered and the API stays a no-op.
 */

import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { NodeSDK } from '@opentelemetry/sdk-node';
import {
  AlwaysOnSampler,
  ParentBasedSampler,
  TraceIdRatioBasedSampler,
  type Sampler,
} from '@opentelemetry/sdk-trace-node';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';

const serviceName = process.env['OTEL_SERVICE_NAME'] ?? 'stock-reconciler';
const serviceVersion = process.env['npm_package_version'] ?? '0.1.0';
const otlpEndpoint = process.env['OTEL_EXPORTER_OTLP_ENDPOINT'] ?? '';
const samplingRatio = Number.parseFloat(process.env['OTEL_SAMPLING_RATIO'] ?? '1.0');
const nodeEnv = process.env['NODE_ENV'] ?? 'development';

if (process.env['OBS_DEBUG'] === '1' && nodeEnv === 'development') {
  diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.DEBUG);
}

function createSampler(): Sampler {
  const ratio = Number.isFinite(samplingRatio) ? samplingRatio : 1;
  if (nodeEnv === 'production') {
    return new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(ratio) });
  }
  return ratio >= 1 ? new AlwaysOnSampler() : new TraceIdRatioBasedSampler(ratio);
}

let sdk: NodeSDK | null = null;

function initializeOtel(): void {
  if (!otlpEndpoint) {
    console.info('[otel] no OTLP endpoint configured, telemetry disabled');
    return;
  }

  try {
    sdk = new NodeSDK({
      resource: resourceFromAttributes({
        [ATTR_SERVICE_NAME]: serviceName,
        [ATTR_SERVICE_VERSION]: serviceVersion,
        'deployment.environment': nodeEnv,
      }),
      traceExporter: new OTLPTraceExporter({ url: `${otlpEndpoint}/v1/traces` }),
      metricReader: new PeriodicExportingMetricReader({
        exporter: new OTLPMetricExporter({ url: `${otlpEndpoint}/v1/metrics` }),
        exportIntervalMillis: 30_000,
      }),
      sampler: createSampler(),
      instrumentations: [
        getNodeAutoInstrumentations({
          '@opentelemetry/instrumentation-fs': { enabled: false },
          '@opentelemetry/instrumentation-dns': { enabled: false },
          '@opentelemetry/instrumentation-net': { enabled: false },
          '@opentelemetry/instrumentation-http': { enabled: true },
          '@opentelemetry/instrumentation-pg': { enabled: true },
          '@opentelemetry/instrumentation-ioredis': { enabled: true },
          '@opentelemetry/instrumentation-fastify': { enabled: true },
        }),
      ],
    });

    sdk.start();
    console.info(`[otel] SDK started (endpoint: ${otlpEndpoint}, sampling: ${String(samplingRatio)})`);

    process.once('SIGTERM', () => {
      sdk
        ?.shutdown()
        .then(() => console.info('[otel] SDK shutdown complete'))
        .catch((err: unknown) => console.error('[otel] SDK shutdown error', err));
    });
  } catch (error: unknown) {
    // telemetry never blocks startup
    console.warn('[otel] failed to initialize SDK, continuing without telemetry', error);
  }
}

initializeOtel();

export { sdk };
