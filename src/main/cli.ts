import type { CaptureTarget } from '@shared/types/capture.types';
import { APP_VERSION, CAPTURE } from '@shared/constants';
import { parseCaptureArgs, USAGE } from './config/captureConfig';
import type { CaptureConfig } from './config/captureConfig';
import { CaptureOrchestrator } from './capture/CaptureOrchestrator';
import type { StateChange } from './capture/CaptureOrchestrator';
import { ConnectionResolver } from './capture/ConnectionResolver';
import { TransportFactory } from './transport/TransportFactory';
import { SocketResourceManager } from './visa/SocketResourceManager';
import { ImageStorage } from './storage/ImageStorage';
import { checkTcpReachable, tryHttpAuth } from './network/preflight';
import { ConfigError } from './utils/errors';
import { logger } from './utils/logger';

/** What to check when no candidate produced an image */
export function troubleshootingHints(target: CaptureTarget): string[] {
  if (target.kind === 'network') {
    return [
      `Ping ${target.host} and check it is on a routable subnet`,
      'On the scope, enable remote control over the network (Utilities > Remote > Network ON)',
      `Try --port 0 for SCPI on ${CAPTURE.SCPI_PORT}, or --port ${CAPTURE.VICP_PORT} for LeCroy VICP`,
      `Check that no firewall blocks ports ${CAPTURE.VICP_PORT} and ${CAPTURE.SCPI_PORT}`,
    ];
  }
  return [
    'Check the cable is in the scope\'s USB device (USB-B) port',
    'Install the vendor USB driver or a VISA runtime for the instrument',
    'List the attached resources and pass one with --resource',
  ];
}

async function preflight(config: CaptureConfig): Promise<void> {
  const { target } = config.request;
  if (target.kind !== 'network') {
    return;
  }

  if (config.credentials) {
    const auth = await tryHttpAuth(
      target.host,
      config.credentials.user,
      config.credentials.password,
      config.request.timeoutSeconds * 1000
    );
    if (!auth.ok) {
      logger.warn(`HTTP authentication was not accepted (${auth.status ?? auth.error}), continuing`);
    }
  }

  const port = await checkTcpReachable(target.host);
  if (port === null) {
    logger.warn(`${target.host} did not accept a connection on any known port, trying anyway`);
  }
}

/**
 * Run one capture from command-line arguments. Resolves to the process
 * exit code.
 */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let config: CaptureConfig;
  try {
    const parsed = parseCaptureArgs(argv, env);
    if (parsed.kind === 'help') {
      logger.info(USAGE);
      return 0;
    }
    config = parsed.config;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      logger.info(USAGE);
      return 1;
    }
    throw error;
  }

  logger.debug(`scope-capture ${APP_VERSION}`);
  await preflight(config);

  const managerFactory = () => new SocketResourceManager();
  const orchestrator = new CaptureOrchestrator(
    {
      opener: new TransportFactory(managerFactory),
      resolver: new ConnectionResolver(managerFactory, { probeVicpFirst: config.probeVicpFirst }),
      storage: new ImageStorage(),
    },
    { minImageBytes: config.minImageBytes }
  );
  orchestrator.on('state-changed', (change: StateChange) => {
    logger.debug(`[CLI] ${change.previous} -> ${change.state}`);
  });

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted, abandoning capture');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const result = await orchestrator.capture(config.request, controller.signal);
    for (const warning of result.warnings) {
      logger.warn(warning);
    }

    if (result.success) {
      logger.info(`Saved ${result.bytes} bytes from ${result.identity.raw || result.identity.vendor} to ${result.path}`);
      return 0;
    }

    logger.error(`Capture failed: ${result.failure.message}`);
    for (const attempt of result.attempts) {
      logger.info(`  ${attempt.reached}: ${attempt.error ?? 'ok'}`);
    }
    for (const hint of troubleshootingHints(config.request.target)) {
      logger.info(`  - ${hint}`);
    }
    return 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
