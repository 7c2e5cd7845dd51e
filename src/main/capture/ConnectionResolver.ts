import { VendorTag } from '@shared/types/capture.types';
import type { Candidate, CaptureTarget, NetworkTarget, RawSocketCandidate } from '@shared/types/capture.types';
import { CAPTURE, LAN_SUBPROTOCOLS, USB_RESOURCE_PATTERNS } from '@shared/constants';
import type { ResourceManagerFactory } from '../visa/types';
import { instrAddress, resourceHost, socketAddress } from '../visa/resourceAddress';
import { getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ConnectionResolverOptions {
  /** Prepend a LeCroy-only VICP candidate on the VICP port */
  probeVicpFirst?: boolean;
}

/** Identity used to de-duplicate candidates and attempted endpoints */
export function candidateKey(candidate: Candidate): string {
  return candidate.kind === 'resource'
    ? candidate.address
    : `${candidate.host}:${candidate.port}`;
}

/** Port for the raw-socket candidate: explicit hint wins, otherwise raw SCPI */
export function resolvePort(port?: number): number {
  return port === undefined || port === 0 ? CAPTURE.SCPI_PORT : port;
}

/**
 * Raw VICP candidate on the same host as a network resource, or null when
 * the candidate is not a TCPIP resource.
 */
export function vicpDowngradeFor(candidate: Candidate): RawSocketCandidate | null {
  if (candidate.kind !== 'resource') {
    return null;
  }
  const host = resourceHost(candidate.address);
  if (!host) {
    return null;
  }
  return { kind: 'raw-socket', host, port: CAPTURE.VICP_PORT };
}

/**
 * Turns a capture target into the ordered list of ways to reach it.
 */
export class ConnectionResolver {
  constructor(
    private readonly resourceManagerFactory: ResourceManagerFactory,
    private readonly options: ConnectionResolverOptions = {}
  ) {}

  async candidatesFor(target: CaptureTarget): Promise<Candidate[]> {
    if (target.kind === 'network') {
      return this.networkCandidates(target);
    }
    if ('address' in target) {
      return [{ kind: 'resource', address: target.address }];
    }
    const discovered = await this.discoverUsb();
    return discovered ? [{ kind: 'resource', address: discovered }] : [];
  }

  private networkCandidates(target: NetworkTarget): Candidate[] {
    const { host } = target;
    const port = resolvePort(target.port);

    const raw: Candidate = port === CAPTURE.VICP_PORT
      ? { kind: 'raw-socket', host, port }
      : { kind: 'resource', address: socketAddress(host, port) };

    const candidates: Candidate[] = [
      { kind: 'resource', address: instrAddress(host, LAN_SUBPROTOCOLS.VXI11) },
      { kind: 'resource', address: instrAddress(host, LAN_SUBPROTOCOLS.HISLIP) },
      raw,
    ];

    if (this.options.probeVicpFirst && raw.kind !== 'raw-socket') {
      candidates.unshift({
        kind: 'raw-socket',
        host,
        port: CAPTURE.VICP_PORT,
        expectVendor: VendorTag.LECROY,
      });
    }

    logger.debug(`[Resolver] ${host}: ${candidates.map(candidateKey).join(', ')}`);
    return candidates;
  }

  /**
   * First USB instrument found. Patterns are tried most specific first and
   * the search stops at the first pattern with any match.
   */
  private async discoverUsb(): Promise<string | null> {
    const manager = this.resourceManagerFactory();
    try {
      for (const pattern of USB_RESOURCE_PATTERNS) {
        let found: string[];
        try {
          found = await manager.listResources(pattern);
        } catch (error) {
          logger.debug(`[Resolver] listResources(${pattern}) failed: ${getErrorMessage(error)}`);
          continue;
        }

        const unique = [...new Set(found)];
        if (unique.length > 0) {
          logger.info(`[Resolver] USB instruments (${pattern}): ${unique.join(', ')}`);
          return unique[0];
        }
      }
      logger.warn('[Resolver] No USB instrument found');
      return null;
    } finally {
      await manager.close();
    }
  }
}
