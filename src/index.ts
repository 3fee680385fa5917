#!/usr/bin/env node
/**
 * Diabetes Progression Predictor - Main Entry Point
 * Provides CLI for starting the prediction server
 */

import 'dotenv/config';
import { loadConfig, validateConfig, type AppConfig } from './config/config.js';
import { formatConfigStatus } from './config/status.js';
import { ApiServer } from './server/index.js';
import { parseArgs } from './cli-args.js';

function printHelp(): void {
  console.log(`
Diabetes Progression Predictor - forwards patient features to an MLflow model endpoint

Usage: predictor [command] [options]

Commands:
  serve     Start the prediction server (default)
  check     Print configuration status and exit
  help      Show this help message

Options:
  -p, --port <port>   Server port (default: PORT or 4000)
  --host <host>       Bind address (default: HOST or 0.0.0.0)
  -h, --help          Show help

Environment (also read from .env):
  MLFLOW_ENDPOINT_URL   Model serving endpoint (required)
  DATABRICKS_TOKEN      Bearer token for the endpoint (required)
  REQUEST_TIMEOUT       Seconds to wait for the endpoint (default: 30)
  PAYLOAD_FORMAT        split | records (default: split)
  APP_ENV               development | production (default: development)
  DEBUG, HOST, PORT, CORS_ORIGINS, APP_NAME, APP_VERSION
`);
}

// ============================================
// Commands
// ============================================

function reportValidation(config: AppConfig): boolean {
  const { valid, errors, warnings } = validateConfig(config);

  for (const warning of warnings) {
    console.warn(`Warning: ${warning}`);
  }

  if (!valid) {
    console.error('\nCONFIGURATION ERROR\n');
    for (const error of errors) {
      console.error(`  - ${error}`);
    }
    console.error('\nPlease check your .env file or environment variables.\n');
  }

  return valid;
}

function runCheck(config: AppConfig): void {
  console.log(formatConfigStatus(config));
  if (!reportValidation(config)) {
    process.exitCode = 1;
    return;
  }
  console.log('Configuration validated successfully.');
}

async function runServe(config: AppConfig): Promise<void> {
  console.log(formatConfigStatus(config));

  if (!reportValidation(config)) {
    process.exitCode = 1;
    return;
  }

  const server = new ApiServer(config);
  await server.start();
  console.log(`
Diabetes Progression Predictor running!

Model endpoint: ${config.scoring.endpointUrl}

Endpoints:
  GET  /               - Prediction form
  POST /predict        - Predict disease progression
  GET  /health         - Configuration readiness
  GET  /api/features   - Expected input features

Press Ctrl+C to stop
`);

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error while stopping server:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.command === 'help') {
    printHelp();
    return;
  }

  const loaded = loadConfig();
  const config: AppConfig = {
    ...loaded,
    server: {
      ...loaded.server,
      port: args.port ?? loaded.server.port,
      host: args.host ?? loaded.server.host,
    },
  };

  switch (args.command) {
    case 'check':
      runCheck(config);
      break;

    case 'serve':
      await runServe(config);
      break;
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
