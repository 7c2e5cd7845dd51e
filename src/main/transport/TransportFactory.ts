import type { Candidate } from '@shared/types/capture.types';
import type { ResourceManagerFactory } from '../visa/types';
import type { InstrumentTransport, TransportOpener } from './types';
import { ResourceTransport } from './ResourceTransport';
import { VICPTransport } from './VICPTransport';
import { SETTLE_DELAYS } from '@shared/constants';
import type { SettleDelays } from '@shared/constants';

export class TransportFactory implements TransportOpener {
  constructor(
    private readonly resourceManagerFactory: ResourceManagerFactory,
    private readonly delays: SettleDelays = SETTLE_DELAYS
  ) {}

  async open(candidate: Candidate, timeoutMs: number): Promise<InstrumentTransport> {
    if (candidate.kind === 'resource') {
      return ResourceTransport.open(this.resourceManagerFactory(), candidate.address, timeoutMs);
    }
    return VICPTransport.open(candidate.host, candidate.port, {
      timeoutMs,
      identifySettleMs: this.delays.VICP_IDENTIFY,
    });
  }
}
