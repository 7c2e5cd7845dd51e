/**
 * VISA resource string helpers.
 *
 *   TCPIP[board]::<host>::<lan device>::INSTR   VXI-11 (inst0) or HiSLIP (hislip0)
 *   TCPIP[board]::<host>::<port>::SOCKET        raw SCPI socket
 *   USB[board]::<vid>::<pid>::<serial>::INSTR   USB-TMC (LeCroy IVI uses ::INST)
 */

export type ResourceClass = 'INSTR' | 'INST' | 'SOCKET';

export interface ParsedResource {
  interfaceType: string;
  board: number;
  resourceClass: ResourceClass | null;
  /** TCPIP only */
  host?: string;
  /** TCPIP SOCKET only */
  port?: number;
  /** TCPIP INSTR only, e.g. inst0 or hislip0 */
  lanDevice?: string;
}

export function instrAddress(host: string, lanDevice: string): string {
  return `TCPIP::${host}::${lanDevice}::INSTR`;
}

export function socketAddress(host: string, port: number): string {
  return `TCPIP::${host}::${port}::SOCKET`;
}

export function parseResourceAddress(address: string): ParsedResource | null {
  const parts = address.split('::');
  const head = /^([A-Za-z]+)(\d*)$/.exec(parts[0]);
  if (!head || parts.length < 2) {
    return null;
  }

  const interfaceType = head[1].toUpperCase();
  const board = head[2] ? parseInt(head[2], 10) : 0;
  const tail = parts[parts.length - 1].toUpperCase();
  const resourceClass: ResourceClass | null =
    tail === 'INSTR' || tail === 'INST' || tail === 'SOCKET' ? tail : null;

  if (interfaceType !== 'TCPIP') {
    return { interfaceType, board, resourceClass };
  }

  const host = parts[1];
  if (resourceClass === 'SOCKET') {
    const port = parts.length === 4 ? Number(parts[2]) : NaN;
    return {
      interfaceType,
      board,
      resourceClass,
      host,
      port: Number.isInteger(port) && port > 0 && port < 65536 ? port : undefined,
    };
  }

  return {
    interfaceType,
    board,
    resourceClass,
    host,
    lanDevice: parts.length >= 4 ? parts[2] : 'inst0',
  };
}

export function isNetworkResource(address: string): boolean {
  return parseResourceAddress(address)?.interfaceType === 'TCPIP';
}

/** Host part of a TCPIP resource, undefined for any other interface */
export function resourceHost(address: string): string | undefined {
  const parsed = parseResourceAddress(address);
  return parsed?.interfaceType === 'TCPIP' ? parsed.host : undefined;
}

/**
 * The address as given, followed by its alternate suffix spelling.
 * Standard VISA registers `::INSTR`; the LeCroy IVI driver registers `::INST`.
 */
export function suffixVariants(address: string): string[] {
  if (address.endsWith('::INSTR')) {
    return [address, `${address.slice(0, -'INSTR'.length)}INST`];
  }
  if (address.endsWith('::INST')) {
    return [address, `${address}R`];
  }
  return [address];
}
