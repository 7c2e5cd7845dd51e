import { VendorTag } from '@shared/types/capture.types';
import type { InstrumentIdentity } from '@shared/types/capture.types';

/** Substring rules, checked in order against the upper-cased `*IDN?` answer */
const VENDOR_RULES: ReadonlyArray<{ vendor: VendorTag; markers: readonly string[] }> = [
  { vendor: VendorTag.LECROY, markers: ['LECROY', 'TELEDYNE'] },
  { vendor: VendorTag.TEKTRONIX, markers: ['TEKTRONIX', 'TEK'] },
  { vendor: VendorTag.KEYSIGHT, markers: ['KEYSIGHT', 'AGILENT', 'HEWLETT'] },
  { vendor: VendorTag.RIGOL_SIGLENT, markers: ['RIGOL', 'SIGLENT'] },
];

export function detectVendor(idn: string): VendorTag {
  const upper = idn.toUpperCase();
  for (const rule of VENDOR_RULES) {
    if (rule.markers.some((marker) => upper.includes(marker))) {
      return rule.vendor;
    }
  }
  return VendorTag.UNKNOWN;
}

export function toIdentity(idn: string): InstrumentIdentity {
  const raw = idn.trim();
  return { raw, vendor: detectVendor(raw) };
}
