import type { InstrumentResource, ResourceManager } from '../visa/types';
import type { InstrumentTransport } from './types';
import { suffixVariants } from '../visa/resourceAddress';
import { ConnectError, QueryError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Transport over a structured (VISA-style) session. Owns both the resource
 * and the manager that opened it.
 */
export class ResourceTransport implements InstrumentTransport {
  readonly kind = 'resource' as const;
  private closed = false;

  private constructor(
    private readonly manager: ResourceManager,
    private readonly resource: InstrumentResource
  ) {}

  get label(): string {
    return this.resource.address;
  }

  /**
   * Open `address`, retrying with the alternate `::INSTR` / `::INST` spelling
   * before giving up. The manager is closed when nothing opens.
   */
  static async open(manager: ResourceManager, address: string, timeoutMs: number): Promise<ResourceTransport> {
    const variants = suffixVariants(address);
    let lastError: unknown;

    for (const attempt of variants) {
      try {
        const resource = await manager.openResource(attempt, timeoutMs);
        if (attempt !== address) {
          logger.info(`[VISA] Opened with adjusted suffix: ${attempt}`);
        }
        resource.timeoutMs = timeoutMs;
        resource.readTermination = '\n';
        resource.writeTermination = '\n';
        return new ResourceTransport(manager, resource);
      } catch (error) {
        lastError = error;
        logger.debug(`[VISA] ${attempt} rejected: ${getErrorMessage(error)}`);
      }
    }

    await manager.close();
    throw new ConnectError(
      `Cannot open resource (tried: ${variants.join(', ')}): ${getErrorMessage(lastError)}`,
      lastError
    );
  }

  async identify(): Promise<string> {
    try {
      return (await this.resource.query('*IDN?')).trim();
    } catch (error) {
      throw new QueryError(`*IDN? failed on ${this.label}: ${getErrorMessage(error)}`, error);
    }
  }

  async write(command: string): Promise<void> {
    await this.resource.write(command);
  }

  async readRaw(): Promise<Buffer> {
    // Binary transfer: a 0x0a inside the image must not end the read
    this.resource.readTermination = null;
    return this.resource.readRaw();
  }

  async queryBinaryBlock(command: string, settleMs: number): Promise<Buffer> {
    this.resource.readTermination = null;
    return this.resource.queryBinaryValues(command, settleMs);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.resource.close();
    } finally {
      await this.manager.close();
    }
  }
}
