/**
 * Environment configuration.
 * Reads which sink backs the root logger and the settings each sink needs.
 * Missing sink settings are only an error once that sink is built.
 */

import { ConfigurationError } from './errors.js';
import { LogLevel, parseLevel } from './types/models.js';

export type SinkKind = 'stream' | 'gcp' | 'aws' | 'azure';

const SINK_KINDS: readonly SinkKind[] = ['stream', 'gcp', 'aws', 'azure'];

export interface LoggingConfig {
  sink: SinkKind;
  rootLevel: LogLevel;
  gcp: { projectId?: string; logName: string };
  aws: { region?: string; logGroupName?: string; logStreamName?: string };
  azure: { endpoint?: string; ruleId?: string; streamName?: string };
  /** Problems that fell back to a default, for the diagnostics channel. */
  warnings: string[];
}

function isSinkKind(value: string): value is SinkKind {
  return SINK_KINDS.some((kind) => kind === value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const warnings: string[] = [];

  const rawSink = (nonEmpty(env.ASYNC_LOGGING_HANDLER) ?? 'stream').toLowerCase();
  let sink: SinkKind = 'stream';
  if (isSinkKind(rawSink)) {
    sink = rawSink;
  } else {
    warnings.push(`Unknown ASYNC_LOGGING_HANDLER "${rawSink}", using stream`);
  }

  const rawLevel = nonEmpty(env.LOG_LEVEL);
  let rootLevel = LogLevel.WARNING;
  if (rawLevel) {
    const parsed = parseLevel(rawLevel);
    if (parsed === null) {
      warnings.push(`Unknown LOG_LEVEL "${rawLevel}", using WARNING`);
    } else {
      rootLevel = parsed;
    }
  }

  return {
    sink,
    rootLevel,
    gcp: {
      projectId: nonEmpty(env.GOOGLE_CLOUD_PROJECT),
      logName: nonEmpty(env.GCP_LOG_NAME) ?? 'node',
    },
    aws: {
      region: nonEmpty(env.AWS_REGION),
      logGroupName: nonEmpty(env.AWS_LOG_GROUP_NAME),
      logStreamName: nonEmpty(env.AWS_LOG_STREAM_NAME),
    },
    azure: {
      endpoint: nonEmpty(env.DATA_COLLECTION_ENDPOINT),
      ruleId: nonEmpty(env.LOGS_DCR_RULE_ID),
      streamName: nonEmpty(env.LOGS_DCR_STREAM_NAME),
    },
    warnings,
  };
}

/** ConfigurationError naming every environment variable in `settings` that has no value. */
export function missingSettingsError(
  sink: SinkKind,
  settings: Record<string, string | undefined>
): ConfigurationError {
  const missing = Object.keys(settings).filter((env) => settings[env] === undefined);
  return new ConfigurationError(
    `Missing required environment variables for ${sink} sink: ${missing.join(', ')}`,
    missing
  );
}
