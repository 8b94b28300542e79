/**
 * Production container: the process-wide registry.
 * Built once on first use: the sink named by ASYNC_LOGGING_HANDLER is
 * attached to the root logger exactly once, and a beforeExit hook drains
 * pending deliveries.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, missingSettingsError, type LoggingConfig } from './config.js';
import { LineFormatter } from './formatters/LineFormatter.js';
import { ConsoleDiagnosticsProvider } from './providers/ConsoleDiagnosticsProvider.js';
import type { IDiagnosticsProvider } from './providers/IDiagnosticsProvider.js';
import { AzureMonitorSink } from './sinks/AzureMonitorSink.js';
import { CloudWatchSink } from './sinks/CloudWatchSink.js';
import { GoogleCloudSink } from './sinks/GoogleCloudSink.js';
import type { ISink } from './sinks/ISink.js';
import { StreamSink } from './sinks/StreamSink.js';
import { AwsCloudWatchTransport } from './transports/AwsCloudWatchTransport.js';
import { AzureMonitorTransport } from './transports/AzureMonitorTransport.js';
import { GoogleCloudLoggingTransport } from './transports/GoogleCloudLoggingTransport.js';
import type { IAzureIngestionTransport } from './transports/IAzureIngestionTransport.js';
import type { ICloudWatchTransport } from './transports/ICloudWatchTransport.js';
import type { IGoogleLoggingTransport } from './transports/IGoogleLoggingTransport.js';

/** Replace the SDK-backed transports (tests, custom clients). */
export interface TransportOverrides {
  cloudWatch?: ICloudWatchTransport;
  google?: IGoogleLoggingTransport;
  azure?: IAzureIngestionTransport;
}

/**
 * Build the sink selected by config. Throws ConfigurationError when the
 * selected sink's settings are missing.
 */
export function createSink(
  config: LoggingConfig,
  diagnostics: IDiagnosticsProvider,
  transports: TransportOverrides = {}
): ISink {
  switch (config.sink) {
    case 'gcp':
      return new GoogleCloudSink(
        transports.google ??
          new GoogleCloudLoggingTransport({
            logName: config.gcp.logName,
            ...(config.gcp.projectId && { projectId: config.gcp.projectId }),
          }),
        diagnostics
      );

    case 'aws': {
      const { region, logGroupName, logStreamName } = config.aws;
      if (!logGroupName || !logStreamName) {
        throw missingSettingsError('aws', {
          AWS_LOG_GROUP_NAME: logGroupName,
          AWS_LOG_STREAM_NAME: logStreamName,
        });
      }
      return new CloudWatchSink(
        transports.cloudWatch ?? new AwsCloudWatchTransport(region ? { region } : undefined),
        { logGroupName, logStreamName }
      );
    }

    case 'azure': {
      const { endpoint, ruleId, streamName } = config.azure;
      if (!endpoint || !ruleId || !streamName) {
        throw missingSettingsError('azure', {
          DATA_COLLECTION_ENDPOINT: endpoint,
          LOGS_DCR_RULE_ID: ruleId,
          LOGS_DCR_STREAM_NAME: streamName,
        });
      }
      return new AzureMonitorSink(transports.azure ?? new AzureMonitorTransport({ endpoint }), {
        ruleId,
        streamName,
      });
    }

    case 'stream':
      return new StreamSink();
  }
}

let cached: Container | null = null;
let exitHook: (() => void) | null = null;

export function getProductionContainer(
  env: NodeJS.ProcessEnv = process.env,
  transports?: TransportOverrides
): Container {
  if (cached) return cached;

  const config = loadConfig(env);
  const diagnostics = new ConsoleDiagnosticsProvider();
  for (const warning of config.warnings) diagnostics.report(warning);

  const container = createContainer({ diagnostics, rootLevel: config.rootLevel });
  const sink = createSink(config, diagnostics, transports);
  container.registry.root.addDispatcher(
    container.createDispatcher(
      sink,
      sink instanceof StreamSink ? { formatter: new LineFormatter(container.serializer) } : undefined
    )
  );

  exitHook = () => {
    void container.registry.shutdown();
  };
  process.once('beforeExit', exitHook);

  cached = container;
  return cached;
}

/** Shut the cached container down and forget it. The next lookup builds a fresh one. */
export async function resetProductionContainer(timeoutMs?: number): Promise<void> {
  const container = cached;
  cached = null;
  if (exitHook) {
    process.off('beforeExit', exitHook);
    exitHook = null;
  }
  if (container) await container.registry.shutdown(timeoutMs);
}
