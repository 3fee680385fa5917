/**
 * Configuration status report printed at startup and by `predictor check`.
 * The token is reported as set/unset only.
 */

import { FEATURE_NAMES } from '../types/index.js';
import type { AppConfig } from './config.js';

const RULE = '='.repeat(70);
const DIVIDER = '-'.repeat(70);

export function formatConfigStatus(config: AppConfig): string {
  const { scoring, server } = config;

  return [
    RULE,
    `${config.appName.toUpperCase()} - CONFIGURATION STATUS`,
    RULE,
    `App Name: ${config.appName}`,
    `Version: ${config.appVersion}`,
    `Environment: ${config.environment}`,
    `Debug Mode: ${server.debug}`,
    `Host: ${server.host}`,
    `Port: ${server.port}`,
    DIVIDER,
    'MLflow Configuration:',
    `Endpoint URL: ${scoring.endpointUrl || '(not set)'}`,
    `Token Set: ${scoring.token ? 'Yes (***hidden***)' : 'No (NOT SET!)'}`,
    `Request Timeout: ${scoring.timeoutMs / 1000}s`,
    `Payload Format: ${scoring.payloadFormat}`,
    DIVIDER,
    `Model Features: ${FEATURE_NAMES.join(', ')}`,
    RULE,
  ].join('\n');
}
